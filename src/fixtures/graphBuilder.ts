// src/fixtures/graphBuilder.ts
// Turns a parsed fixture document into entity instances.
//
// Every mapping node becomes at most one instance: the instance is registered
// under the node (object identity, not value) before its fields are built, so
// aliases, back-references and cycles all resolve to the same object.
// Instances are appended to the construction record once their fields are
// complete; children therefore precede the entities that contain them.
// Plain lists and mappings are registered the same way (but never recorded),
// so self-referencing containers resolve to the partly built value.

import { isAlias, isMap, isNode, isScalar, isSeq } from "yaml";
import type { Document, Node as YamlNode, Scalar, YAMLMap, YAMLSeq } from "yaml";
import type {
  EntityType,
  ManyToManyField,
  ManyToOneField,
  Model,
  ScalarFieldType,
} from "../orm/index.js";
import { ConstructionError, ParseError } from "./errors.js";
import type { TypeRegistry } from "./tags.js";
import { coerceTemporal } from "./temporal.js";

const MERGE_KEY = "<<";

function isMergeKey(key: unknown): boolean {
  return isScalar(key) && (key.source === MERGE_KEY || key.value === MERGE_KEY);
}

export class GraphBuilder {
  private doc: Document;
  private registry: TypeRegistry;
  /** Instance built from each node, keyed by node identity */
  private identity = new Map<YamlNode, Model>();
  /** Plain lists and objects built from each node */
  private containers = new Map<YamlNode, unknown[] | Record<string, unknown>>();
  private constructed: Model[] = [];

  constructor(doc: Document, registry: TypeRegistry) {
    this.doc = doc;
    this.registry = registry;
  }

  /** Entity instances in the order their construction completed */
  get record(): readonly Model[] {
    return this.constructed;
  }

  /** Construct the whole document; returns the value of its root node */
  build(): unknown {
    return this.construct(this.doc.contents);
  }

  /**
   * Construct the value of a node. `expected` is the entity type declared by
   * the field the node is assigned to; it types untagged mappings.
   */
  construct(node: unknown, expected?: EntityType): unknown {
    const target = this.deref(node);
    if (target === null) return null;

    const cached = this.identity.get(target);
    if (cached) return cached;

    if (isMap(target)) {
      const type = this.entityTypeOf(target.tag, expected);
      if (type) return this.constructEntity(target, type);
      return this.containers.get(target) ?? this.constructMap(target);
    }
    if (isSeq(target)) {
      this.rejectEntityTag(target.tag, "a sequence");
      return this.containers.get(target) ?? this.constructSeq(target);
    }
    if (isScalar(target)) {
      return this.constructScalar(target);
    }
    throw new ParseError("Alias does not resolve to a node");
  }

  /* ---------- Nodes ---------- */

  /** Follow an alias to its anchored node */
  private deref(node: unknown): YamlNode | null {
    if (isAlias(node)) {
      const resolved = node.resolve(this.doc);
      if (!resolved) throw new ParseError(`Unresolved alias *${node.source}`);
      return resolved;
    }
    return isNode(node) ? node : null;
  }

  private entityTypeOf(tag: string | undefined, expected?: EntityType): EntityType | undefined {
    if (!tag) return expected;
    if (this.registry.isStandardTag(tag)) return undefined;
    return this.registry.resolve(tag);
  }

  private rejectEntityTag(tag: string | undefined, shape: string): void {
    const type = this.entityTypeOf(tag);
    if (type) {
      throw new ConstructionError(`${type.name} cannot be built from ${shape}`);
    }
  }

  private constructScalar(scalar: Scalar): unknown {
    const type = this.entityTypeOf(scalar.tag);
    if (type) {
      // `- !Circle:` with nothing after it: an entity with no fields set.
      // Unresolved local tags fall back to the string tag, so the value is "".
      if (scalar.value !== null && scalar.value !== "") {
        throw new ConstructionError(`${type.name} cannot be built from a scalar`);
      }
      return this.constructEntity(scalar, type);
    }
    return scalar.value instanceof Date ? coerceTemporal(scalar.value) : scalar.value;
  }

  private constructSeq(seq: YAMLSeq): unknown[] {
    const out: unknown[] = [];
    this.containers.set(seq, out);
    for (const item of seq.items) {
      out.push(this.construct(item));
    }
    return out;
  }

  private constructMap(map: YAMLMap): Record<string, unknown> {
    // No prototype: keys such as __proto__ or toString are plain data here
    const out: Record<string, unknown> = Object.create(null);
    this.containers.set(map, out);
    for (const [key, value] of this.entriesOf(map, k => String(this.construct(k)))) {
      out[key] = this.construct(value);
    }
    return out;
  }

  /* ---------- Entities ---------- */

  private constructEntity(node: YAMLMap | Scalar, type: EntityType): Model {
    const entity = new type.model();
    this.identity.set(node, entity);

    if (isMap(node)) {
      for (const [name, value] of this.fieldsOf(node, type)) {
        entity[name] = this.constructField(type, name, value);
      }
    }

    this.constructed.push(entity);
    return entity;
  }

  /** Field name → value node */
  private fieldsOf(map: YAMLMap, type: EntityType): Map<string, unknown> {
    return this.entriesOf(map, key => this.fieldNameOf(key, type));
  }

  /**
   * Key → value node, merge keys expanded. Explicit keys win over merged
   * ones; earlier merge sources win over later ones. `merging` holds the
   * mappings whose merge chain is being followed.
   */
  private entriesOf(
    map: YAMLMap,
    keyOf: (key: unknown) => string,
    merging = new Set<YAMLMap>()
  ): Map<string, unknown> {
    if (merging.has(map)) {
      throw new ConstructionError("Merge cycle: a mapping merges itself");
    }
    merging.add(map);

    const entries = new Map<string, unknown>();
    const merged: YAMLMap[] = [];
    for (const pair of map.items) {
      if (isMergeKey(pair.key)) {
        merged.push(...this.mergeSources(pair.value));
        continue;
      }
      entries.set(keyOf(pair.key), pair.value);
    }

    for (const source of merged) {
      for (const [key, value] of this.entriesOf(source, keyOf, merging)) {
        if (!entries.has(key)) entries.set(key, value);
      }
    }

    merging.delete(map);
    return entries;
  }

  private mergeSources(value: unknown): YAMLMap[] {
    const node = this.deref(value);
    if (isMap(node)) return [node];
    if (isSeq(node)) {
      return node.items.map(item => {
        const source = this.deref(item);
        if (!isMap(source)) {
          throw new ConstructionError("Merge list items must be mappings");
        }
        return source;
      });
    }
    throw new ConstructionError("Merge value must be a mapping or a list of mappings");
  }

  private fieldNameOf(key: unknown, type: EntityType): string {
    if (!isScalar(key)) {
      throw new ConstructionError(`${type.name} field names must be scalars`);
    }
    const name = key.source ?? String(key.value);
    if (!Object.prototype.hasOwnProperty.call(type.fields, name)) {
      throw new ConstructionError(`Unknown field "${name}" on ${type.name}`);
    }
    return name;
  }

  private constructField(type: EntityType, name: string, value: unknown): unknown {
    const field = type.fields[name];
    const node = this.deref(value);
    if (node === null || (isScalar(node) && node.value === null)) {
      return null;
    }

    switch (field.type) {
      case "manyToOne":
        return this.constructReference(type, name, field, node);
      case "manyToMany": {
        if (!isSeq(node)) {
          throw new ConstructionError(`${type.name}.${name}: expected a list of ${field.target}`);
        }
        return node.items.map(item => this.constructReference(type, name, field, item));
      }
      default: {
        if (!isScalar(node)) {
          throw new ConstructionError(`${type.name}.${name}: expected a ${field.type} value`);
        }
        this.rejectEntityTag(node.tag, `the scalar ${type.name}.${name}`);
        return this.scalarValue(`${type.name}.${name}`, field.type, node);
      }
    }
  }

  private constructReference(
    owner: EntityType,
    name: string,
    field: ManyToOneField | ManyToManyField,
    node: unknown
  ): Model {
    const target = this.registry.typeNamed(field.target);
    if (!target) {
      throw new ConstructionError(`${owner.name}.${name}: entity type ${field.target} is not registered`);
    }
    const value = this.construct(node, target);
    if (!(value instanceof target.model)) {
      throw new ConstructionError(`${owner.name}.${name}: expected a ${target.name}`);
    }
    return value;
  }

  private scalarValue(path: string, type: ScalarFieldType, scalar: Scalar): unknown {
    const value = scalar.value;
    switch (type) {
      case "string":
        return typeof value === "string" ? value : (scalar.source ?? String(value));
      case "integer":
        if (typeof value === "number" && Number.isInteger(value)) {
          if (!Number.isSafeInteger(value)) {
            throw new ConstructionError(`${path}: ${scalar.source ?? value} is outside the safe integer range`);
          }
          return value;
        }
        break;
      case "decimal":
        if (typeof value === "number") return value;
        break;
      case "boolean":
        if (typeof value === "boolean") return value;
        break;
      case "date":
      case "datetime":
      case "instant":
        if (value instanceof Date) return coerceTemporal(value, type);
        break;
    }
    throw new ConstructionError(`${path}: expected a ${type} value, got ${JSON.stringify(scalar.source ?? value)}`);
  }
}
