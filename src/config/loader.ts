import { readFileSync } from 'node:fs';
import {
  parseDocument,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  type CollectionTag,
  type Document,
  type YAMLMap,
} from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { connectionFieldsSchema, formatIssues, queueFieldsSchema, runnerSettingsSchema } from './schema.js';
import {
  WORKER_TYPES,
  type Connection,
  type Declaration,
  type Queue,
  type SkrodeConfig,
  type WorkerDeclaration,
  type WorkerType,
} from './types.js';

export const CONNECTION_TAG = '!skrode/redis';
export const QUEUE_TAG = '!skrode/queue';

const TAG_PREFIX = '!skrode/';
const TOPOLOGY_KEY = 'workers';
const RUNNER_KEY = 'runner';

/** Worker properties holding a queue reference rather than a plain value. */
const QUEUE_REFERENCE_FIELDS = new Set(['queue', 'source']);

const skrodeTags: CollectionTag[] = [CONNECTION_TAG, QUEUE_TAG].map((tag): CollectionTag => ({
  tag,
  collection: 'map',
  default: false,
  resolve: (value) => value,
}));

/**
 * Parse a topology document into resolved connections, queues and worker
 * declarations. Pure: nothing is opened or connected.
 */
export function parseConfig(text: string): SkrodeConfig {
  const doc = parseDocument(text, { customTags: skrodeTags });
  if (doc.errors.length > 0) {
    throw new ConfigError(`Invalid YAML: ${doc.errors.map((e) => e.message).join('; ')}`);
  }
  return new DocumentReader(doc).read();
}

/**
 * Read and parse a topology document from disk.
 */
export function loadConfig(configPath: string): SkrodeConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfig(text);
}

/**
 * Replace `${VAR}` placeholders with values from process.env.
 */
function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
    const resolved = process.env[name];
    if (resolved === undefined) {
      throw new ConfigError(`Environment variable ${name} is not set`);
    }
    return resolved;
  });
}

function isDeclarationNode(node: unknown): node is YAMLMap {
  return isMap(node) && typeof node.tag === 'string' && node.tag.startsWith(TAG_PREFIX);
}

function keyOf(key: unknown): string {
  if (isScalar(key) && (typeof key.value === 'string' || typeof key.value === 'number')) {
    return String(key.value);
  }
  throw new ConfigError('Mapping keys must be plain strings');
}

function isEmpty(node: unknown): boolean {
  return node === null || node === undefined || (isScalar(node) && node.value === null);
}

class DocumentReader {
  /** Top-level tagged entries by name, for string references. */
  private named = new Map<string, YAMLMap>();
  /** The top-level name of each tagged node. */
  private nameOf = new Map<YAMLMap, string>();
  private declarations = new Map<YAMLMap, Declaration>();
  private building = new Set<YAMLMap>();

  private connections = new Map<string, Connection>();
  private queues = new Map<string, Queue>();

  constructor(private doc: Document) {}

  read(): SkrodeConfig {
    const root = this.doc.contents;
    if (!isMap(root)) {
      throw new ConfigError('Topology document must be a mapping of names to entries');
    }

    const entries = root.items.map((pair) => ({ name: keyOf(pair.key), node: pair.value }));

    for (const { name, node } of entries) {
      if (isDeclarationNode(node)) {
        this.named.set(name, node);
        this.nameOf.set(node, name);
      }
    }

    for (const { name, node } of entries) {
      if (isDeclarationNode(node)) this.declarationFor(node, name);
    }

    const workers = new Map<string, WorkerDeclaration>();
    let topology: string[] | undefined;
    let runner: unknown = {};

    for (const { name, node } of entries) {
      if (name === TOPOLOGY_KEY) {
        topology = this.readTopology(node);
      } else if (name === RUNNER_KEY) {
        runner = this.toValue(node, name);
      } else if (isMap(node) && node.has('type') && !isDeclarationNode(node)) {
        workers.set(name, this.readWorker(name, node));
      }
    }

    if (!topology) {
      throw new ConfigError(`Missing top-level "${TOPOLOGY_KEY}" list`);
    }

    const settings = runnerSettingsSchema.safeParse(runner);
    if (!settings.success) {
      throw new ConfigError(`Invalid "${RUNNER_KEY}" settings: ${formatIssues(settings.error)}`);
    }

    return {
      connections: this.connections,
      queues: this.queues,
      workers,
      topology,
      runner: settings.data,
    };
  }

  private readTopology(node: unknown): string[] {
    const seq = isAlias(node) ? this.deref(node) : node;
    if (!isSeq(seq)) {
      throw new ConfigError(`"${TOPOLOGY_KEY}" must be a list of worker names`);
    }
    return seq.items.map((item) => {
      const value = this.toValue(item, TOPOLOGY_KEY);
      if (typeof value !== 'string' || value === '') {
        throw new ConfigError(`"${TOPOLOGY_KEY}" must be a list of worker names`);
      }
      return value;
    });
  }

  private readWorker(name: string, map: YAMLMap): WorkerDeclaration {
    const type = this.toValue(map.get('type', true), `${name}.type`);
    if (!isWorkerType(type)) {
      throw new ConfigError(`Worker "${name}" has unknown type: "${String(type)}"`);
    }

    const properties: Record<string, unknown> = {};
    for (const pair of map.items) {
      const key = keyOf(pair.key);
      if (key === 'type') continue;

      properties[key] = QUEUE_REFERENCE_FIELDS.has(key)
        ? this.reference(pair.value, 'queue', `${name}.${key}`)
        : this.toValue(pair.value, `${name}.${key}`);
    }

    return { name, type, properties };
  }

  private declarationFor(map: YAMLMap, fallbackName: string): Declaration {
    const cached = this.declarations.get(map);
    if (cached) return cached;

    const name = this.nameOf.get(map) ?? map.anchor ?? fallbackName;
    if (this.building.has(map)) {
      throw new ConfigError(`Declaration "${name}" references itself`);
    }
    this.building.add(map);

    let declaration: Declaration;
    switch (map.tag) {
      case CONNECTION_TAG:
        declaration = this.readConnection(name, map);
        break;
      case QUEUE_TAG:
        declaration = this.readQueue(name, map);
        break;
      default:
        throw new ConfigError(`Unsupported tag ${String(map.tag)} on "${name}"`);
    }

    this.building.delete(map);
    this.declarations.set(map, declaration);
    return declaration;
  }

  private readConnection(name: string, map: YAMLMap): Connection {
    if (this.connections.has(name)) {
      throw new ConfigError(`Duplicate connection name: "${name}"`);
    }

    const parsed = connectionFieldsSchema.safeParse(this.toValue(map, name, false));
    if (!parsed.success) {
      throw new ConfigError(`Connection "${name}" is invalid: ${formatIssues(parsed.error)}`);
    }

    const connection: Connection = { kind: 'connection', name, ...parsed.data };
    this.connections.set(name, connection);
    return connection;
  }

  private readQueue(name: string, map: YAMLMap): Queue {
    if (this.queues.has(name)) {
      throw new ConfigError(`Duplicate queue name: "${name}"`);
    }

    const fields: Record<string, unknown> = {};
    let connection: Connection | undefined;
    for (const pair of map.items) {
      const key = keyOf(pair.key);
      if (key === 'conn') {
        connection = this.reference(pair.value, 'connection', `${name}.conn`);
      } else {
        fields[key] = this.toValue(pair.value, `${name}.${key}`);
      }
    }

    if (!connection) {
      throw new ConfigError(`Queue "${name}" is missing required property: "conn"`);
    }

    const parsed = queueFieldsSchema.safeParse(fields);
    if (!parsed.success) {
      throw new ConfigError(`Queue "${name}" is invalid: ${formatIssues(parsed.error)}`);
    }

    const queue: Queue = { kind: 'queue', name, connection, ...parsed.data };
    this.queues.set(name, queue);
    return queue;
  }

  /**
   * Resolve an alias, an inline tagged mapping, or a top-level name to a
   * declaration of the expected kind. An empty value resolves to undefined.
   */
  private reference(node: unknown, kind: 'connection', path: string): Connection | undefined;
  private reference(node: unknown, kind: 'queue', path: string): Queue | undefined;
  private reference(node: unknown, kind: Declaration['kind'], path: string): Declaration | undefined {
    if (isEmpty(node)) return undefined;

    let target = isAlias(node) ? this.deref(node) : node;

    if (isScalar(target) && typeof target.value === 'string') {
      const named = this.named.get(target.value);
      if (!named) {
        throw new ConfigError(`"${path}" references undeclared ${kind}: "${target.value}"`);
      }
      target = named;
    }

    if (!isDeclarationNode(target)) {
      throw new ConfigError(`"${path}" must reference a ${kind}`);
    }

    const declaration = this.declarationFor(target, path);
    if (declaration.kind !== kind) {
      throw new ConfigError(`"${path}" must reference a ${kind}, but "${declaration.name}" is a ${declaration.kind}`);
    }
    return declaration;
  }

  private deref(node: { source: string; resolve(doc: Document): unknown }): unknown {
    const target = node.resolve(this.doc);
    if (!target) {
      throw new ConfigError(`Unresolved alias "*${node.source}"`);
    }
    return target;
  }

  /**
   * Convert a node to plain data. Aliases are followed, tagged mappings
   * become their declarations (unless `declarations` is false, for the
   * body of a declaration itself) and strings get env placeholders filled.
   */
  private toValue(node: unknown, path: string, declarations = true): unknown {
    if (isEmpty(node)) return null;
    if (isAlias(node)) return this.toValue(this.deref(node), path);

    if (isMap(node)) {
      if (declarations && isDeclarationNode(node)) {
        return this.declarationFor(node, path);
      }
      const out: Record<string, unknown> = {};
      for (const pair of node.items) {
        const key = keyOf(pair.key);
        out[key] = this.toValue(pair.value, `${path}.${key}`);
      }
      return out;
    }

    if (isSeq(node)) {
      return node.items.map((item, i) => this.toValue(item, `${path}[${i}]`));
    }

    if (isScalar(node)) {
      return typeof node.value === 'string' ? resolveEnvVars(node.value) : node.value;
    }

    throw new ConfigError(`Unsupported value at "${path}"`);
  }
}

function isWorkerType(value: unknown): value is WorkerType {
  return typeof value === 'string' && (WORKER_TYPES as readonly string[]).includes(value);
}
