/**
 * Endpoint registry: discovers handler modules under a root directory and
 * binds them into a name → descriptor map.
 *
 * Discovery rules (scanEndpoints):
 *   <root>/popup.ts                 simple endpoint "popup"
 *   <root>/shutdown/endpoint.ts     complex endpoint "shutdown"; other files in
 *                                   shutdown/ are private helpers, not walked
 *   <root>/process/execute.ts       grouping folder: walked, "execute" registered
 *   blueprint.*, index.*            excluded files
 *   __tests__, node_modules, ...    excluded directories
 *
 * Names are unique across the whole tree; a collision fails discovery.
 * Entries are visited in sorted order so the same tree always yields the same
 * manifest list.
 *
 * loadRegistry() then imports each manifest's module and takes its default
 * export. Modules are only bound; no handler runs at load time.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import {
  ENDPOINT_NAME_PATTERN,
  isEndpointDefinition,
  type EndpointDefinition,
  type EndpointMethod,
} from "./endpoint.js";
import { ConfigurationError, NotFoundError } from "./errors.js";

export type EndpointKind = "simple" | "complex";

export interface EndpointManifest {
  name: string;
  kind: EndpointKind;
  /** Absolute path of the routable module (the file, or the directory's entry point). */
  modulePath: string;
  /** Path relative to the scanned root, for logs and the tree listing. */
  relativePath: string;
}

export interface EndpointDescriptor {
  readonly name: string;
  readonly kind: EndpointKind;
  readonly requiresAuth: boolean;
  readonly methods: readonly EndpointMethod[];
  readonly description: string;
  /** Empty for endpoints registered in code. */
  readonly modulePath: string;
  readonly definition: EndpointDefinition;
}

export interface ScanOptions {
  /** Base name of a complex endpoint's entry point. Default "endpoint". */
  entryPoint?: string;
  /** Base names (no extension) that are never endpoints. */
  excludedFiles?: readonly string[];
  excludedDirs?: readonly string[];
}

export const DEFAULT_ENTRY_POINT = "endpoint";
export const DEFAULT_EXCLUDED_FILES: readonly string[] = ["blueprint", "index"];
export const DEFAULT_EXCLUDED_DIRS: readonly string[] = ["__tests__", "__fixtures__", "node_modules", "disabled"];

const MODULE_EXTENSIONS = [".ts", ".mts", ".js", ".mjs"];
const NON_HANDLER_SUFFIXES = [".d.ts", ".d.mts", ".test.ts", ".spec.ts", ".test.js", ".spec.js"];

// ── Discovery ───────────────────────────────────────────

function moduleBaseName(fileName: string): string | null {
  if (NON_HANDLER_SUFFIXES.some((suffix) => fileName.endsWith(suffix))) return null;
  const ext = path.extname(fileName);
  if (!MODULE_EXTENSIONS.includes(ext)) return null;
  return fileName.slice(0, -ext.length);
}

function findEntryPoint(dir: string, entryPoint: string): string | null {
  for (const ext of MODULE_EXTENSIONS) {
    const candidate = path.join(dir, `${entryPoint}${ext}`);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return candidate;
  }
  return null;
}

/**
 * Walk `rootDir` and list every endpoint it defines. Reads the filesystem
 * only. Throws ConfigurationError for a missing root, a malformed name or a
 * duplicate name.
 */
export function scanEndpoints(rootDir: string, options: ScanOptions = {}): EndpointManifest[] {
  const entryPoint = options.entryPoint ?? DEFAULT_ENTRY_POINT;
  const excludedFiles = new Set([...(options.excludedFiles ?? DEFAULT_EXCLUDED_FILES), entryPoint]);
  const excludedDirs = new Set(options.excludedDirs ?? DEFAULT_EXCLUDED_DIRS);
  const root = path.resolve(rootDir);

  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new ConfigurationError(`Endpoint root is not a directory: ${root}`);
  }

  const manifests: EndpointManifest[] = [];
  const problems: string[] = [];

  function add(name: string, kind: EndpointKind, modulePath: string): void {
    const relativePath = path.relative(root, modulePath);
    if (!ENDPOINT_NAME_PATTERN.test(name)) {
      problems.push(`invalid endpoint name '${name}' (${relativePath})`);
      return;
    }
    manifests.push({ name, kind, modulePath, relativePath });
  }

  function walk(dir: string): void {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (excludedDirs.has(entry.name) || entry.name.startsWith(".")) continue;

        const entryFile = findEntryPoint(fullPath, entryPoint);
        if (entryFile) {
          add(entry.name, "complex", entryFile);
        } else {
          walk(fullPath);
        }
        continue;
      }

      if (!entry.isFile()) continue;
      const base = moduleBaseName(entry.name);
      if (base === null || excludedFiles.has(base)) continue;
      add(base, "simple", fullPath);
    }
  }

  walk(root);

  const seen = new Map<string, EndpointManifest>();
  for (const manifest of manifests) {
    const previous = seen.get(manifest.name);
    if (previous) {
      problems.push(
        `duplicate endpoint name '${manifest.name}' (${previous.relativePath}, ${manifest.relativePath})`,
      );
      continue;
    }
    seen.set(manifest.name, manifest);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Endpoint discovery failed in ${root}`, problems);
  }

  return manifests;
}

// ── Registry ────────────────────────────────────────────

export class EndpointRegistry {
  private readonly endpoints: ReadonlyMap<string, EndpointDescriptor>;

  constructor(descriptors: Iterable<EndpointDescriptor>) {
    const endpoints = new Map<string, EndpointDescriptor>();
    for (const descriptor of descriptors) {
      if (endpoints.has(descriptor.name)) {
        throw new ConfigurationError(`Duplicate endpoint name '${descriptor.name}'`);
      }
      endpoints.set(descriptor.name, Object.freeze({ ...descriptor }));
    }
    this.endpoints = endpoints;
  }

  /** Registry for endpoints defined in code rather than discovered on disk. */
  static fromDefinitions(definitions: Record<string, EndpointDefinition>): EndpointRegistry {
    return new EndpointRegistry(
      Object.entries(definitions).map(([name, definition]) => describe(name, "simple", "", definition)),
    );
  }

  get size(): number {
    return this.endpoints.size;
  }

  lookup(name: string): EndpointDescriptor | undefined {
    return this.endpoints.get(name);
  }

  resolve(name: string): EndpointDescriptor {
    const descriptor = this.endpoints.get(name);
    if (!descriptor) throw new NotFoundError(`Endpoint '${name}'`);
    return descriptor;
  }

  list(): EndpointDescriptor[] {
    return [...this.endpoints.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

function describe(
  name: string,
  kind: EndpointKind,
  modulePath: string,
  definition: EndpointDefinition,
): EndpointDescriptor {
  return {
    name,
    kind,
    requiresAuth: definition.requiresAuth,
    methods: definition.methods,
    description: definition.description,
    modulePath,
    definition,
  };
}

/**
 * Discover and bind every endpoint under `rootDir`.
 * Throws ConfigurationError when a module does not default-export a definition.
 */
export async function loadRegistry(rootDir: string, options: ScanOptions = {}): Promise<EndpointRegistry> {
  const manifests = scanEndpoints(rootDir, options);
  const descriptors: EndpointDescriptor[] = [];
  const problems: string[] = [];

  for (const manifest of manifests) {
    const mod: unknown = await import(pathToFileURL(manifest.modulePath).href);
    const definition = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : undefined;

    if (!isEndpointDefinition(definition)) {
      problems.push(`${manifest.relativePath} does not export an endpoint definition`);
      continue;
    }
    descriptors.push(describe(manifest.name, manifest.kind, manifest.modulePath, definition));
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Endpoint loading failed in ${path.resolve(rootDir)}`, problems);
  }

  return new EndpointRegistry(descriptors);
}
