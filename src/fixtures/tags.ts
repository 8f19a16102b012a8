// src/fixtures/tags.ts
// Tag → entity type bindings for one load.

import type { EntityType } from "../orm/index.js";
import { UnknownTagError } from "./errors.js";

/** Prefix of the tags defined by YAML itself (!!str, !!timestamp, …) */
const STANDARD_TAG_PREFIX = "tag:yaml.org,2002:";

/** Fixture tag of an entity type: `!Contact:` */
export function tagOf(type: EntityType): string {
  return `!${type.name}:`;
}

export class TypeRegistry {
  private byTag = new Map<string, EntityType>();
  private byName = new Map<string, EntityType>();

  constructor(types: readonly EntityType[]) {
    for (const type of types) {
      this.byTag.set(tagOf(type), type);
      this.byName.set(type.name, type);
    }
  }

  /** @throws UnknownTagError when no type is bound to the tag */
  resolve(tag: string): EntityType {
    const type = this.byTag.get(tag);
    if (!type) throw new UnknownTagError(tag);
    return type;
  }

  /** Type named by a relation field's `target`, if it is registered */
  typeNamed(name: string): EntityType | undefined {
    return this.byName.get(name);
  }

  isStandardTag(tag: string): boolean {
    return tag.startsWith(STANDARD_TAG_PREFIX);
  }

  get size(): number {
    return this.byTag.size;
  }
}

export function createTypeRegistry(types: readonly EntityType[]): TypeRegistry {
  return new TypeRegistry(types);
}
