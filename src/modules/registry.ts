/**
 * Module Registry
 *
 * Reads ENABLED_MODULES from environment and builds the module dependency
 * graph. The entity types owned by enabled modules are the default entity
 * enumeration used when loading fixtures.
 *
 * Enabling a module always enables the modules it depends on.
 */

import { models } from '../models/index.js';
import type { EntityType } from '../orm/index.js';

/* ---------- Module ---------- */

export class Module {
  readonly name: string;
  version: string;
  installedVersion: string | null = null;
  installed = false;
  removable = false;

  private depends: Module[] = [];

  constructor(name: string, version: string) {
    this.name = name;
    this.version = version;
  }

  getDepends(): readonly Module[] {
    return this.depends;
  }

  /** Add a dependency; adding the same module twice is a no-op */
  dependsOn(module: Module): void {
    if (!this.depends.some(d => d.equals(module))) {
      this.depends.push(module);
    }
  }

  /** Modules are identified by name */
  equals(other: Module): boolean {
    return other.name === this.name;
  }

  isUpgradable(): boolean {
    return this.installed && this.version !== this.installedVersion;
  }

  /** Whether the entity type belongs to this module. `core` also owns `meta` types. */
  hasEntity(type: EntityType): boolean {
    const owned = this.name === 'core' ? ['core', 'meta'] : [this.name];
    return owned.includes(type.module);
  }

  /** Dependency tree, one module per line */
  pprint(depth = 1): string {
    let out = `${this.name}\n`;
    for (const dep of this.depends) {
      out += `${'  '.repeat(depth)}-> ${dep.pprint(depth + 1)}`;
    }
    return out;
  }

  toString(): string {
    return `Module{name=${this.name}, version=${this.version}}`;
  }
}

/* ---------- Known modules ---------- */

/** Known module identifiers */
export type ModuleId = 'core' | 'contact';

const KNOWN_MODULES: Readonly<Record<ModuleId, { version: string; depends: readonly ModuleId[] }>> = {
  core: { version: '1.0.0', depends: [] },
  contact: { version: '1.0.0', depends: ['core'] },
};

function isModuleId(value: string): value is ModuleId {
  return Object.prototype.hasOwnProperty.call(KNOWN_MODULES, value);
}

/** Default: all modules enabled */
const DEFAULT_ENABLED = 'core,contact';

export interface ModuleRegistryConfig {
  /** Every known module, wired to its dependencies */
  modules: ReadonlyMap<ModuleId, Module>;
  /** Enabled modules, dependencies before dependents */
  enabledModules: Module[];
  /** Set for O(1) lookup */
  enabledSet: ReadonlySet<ModuleId>;
}

// --- Env helpers ---

function env(name: string, fallback?: string): string {
  return (process.env[name] ?? fallback ?? '').toString();
}

function buildGraph(): Map<ModuleId, Module> {
  const graph = new Map<ModuleId, Module>();
  for (const [id, known] of Object.entries(KNOWN_MODULES)) {
    if (isModuleId(id)) graph.set(id, new Module(id, known.version));
  }
  for (const [id, module] of graph) {
    for (const dep of KNOWN_MODULES[id].depends) {
      const target = graph.get(dep);
      if (target) module.dependsOn(target);
    }
  }
  return graph;
}

function parseEnabledModules(raw: string): ModuleId[] {
  const parts = raw
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(s => s.length > 0);

  const ordered: ModuleId[] = [];
  const visit = (id: ModuleId): void => {
    if (ordered.includes(id)) return;
    for (const dep of KNOWN_MODULES[id].depends) visit(dep);
    ordered.push(id);
  };
  for (const p of parts) {
    if (isModuleId(p)) visit(p);
  }

  if (ordered.length === 0) {
    throw new Error(
      `ENABLED_MODULES resolved to empty list (raw: "${raw}"). ` +
      `At least one module must be enabled. Known modules: ${Object.keys(KNOWN_MODULES).join(', ')}`
    );
  }

  return ordered;
}

export function loadModuleRegistry(): ModuleRegistryConfig {
  const modules = buildGraph();
  const ids = parseEnabledModules(env('ENABLED_MODULES', DEFAULT_ENABLED));
  const enabledModules: Module[] = [];
  for (const id of ids) {
    const module = modules.get(id);
    if (module) enabledModules.push(module);
  }
  return {
    modules,
    enabledModules,
    enabledSet: new Set(ids),
  };
}

// --- Singleton ---

let _registry: ModuleRegistryConfig | null = null;

export function getModuleRegistry(): ModuleRegistryConfig {
  if (!_registry) {
    _registry = loadModuleRegistry();
  }
  return _registry;
}

/** For testing: reset registry so it re-reads env */
export function resetModuleRegistry(): void {
  _registry = null;
}

// --- Public API ---

export function isModuleEnabled(module: ModuleId): boolean {
  return getModuleRegistry().enabledSet.has(module);
}

/**
 * Entity types owned by the enabled modules, in declaration order.
 * Default entity enumeration for fixture loading.
 */
export function enabledModels(): readonly EntityType[] {
  const enabled = getModuleRegistry().enabledModules;
  return models().filter(type => enabled.some(m => m.hasEntity(type)));
}
