import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { loadConfig, parseConfig } from './loader.js';
import { loadEnv, runnerSettingsSchema } from './schema.js';
import { ConfigError } from '../errors.js';
import { makeTmpDir } from '../test-utils.js';

const TEST_TOPOLOGY = `
---
# The Redis database connections should go to
redis:
  &redis
  !skrode/redis
  host: localhost
  port: 6379
  db: 0

random_queue:
  &random_queue
  !skrode/queue
  conn: *redis
  key: /queue/random_data/ready

random_data_source:
  type: custom
  target: skrode.ingesters.test:random
  queue: *random_queue
  rate: 5

random_data_mapper:
  type: map
  target: skrode.ingesters.test:do_print
  source: *random_queue

workers:
  - random_data_source
  - random_data_mapper
  - random_data_mapper
`;

describe('Config', () => {
  it('parses connections, queues, workers and topology', () => {
    const config = parseConfig(TEST_TOPOLOGY);

    expect(config.connections.get('redis')).toEqual({
      kind: 'connection',
      name: 'redis',
      host: 'localhost',
      port: 6379,
      db: 0,
    });

    const queue = config.queues.get('random_queue');
    expect(queue?.key).toBe('/queue/random_data/ready');
    expect(queue?.connection).toBe(config.connections.get('redis'));

    expect(config.topology).toEqual(['random_data_source', 'random_data_mapper', 'random_data_mapper']);
    expect(Array.from(config.workers.keys())).toEqual(['random_data_source', 'random_data_mapper']);
  });

  it('resolves worker queue aliases to the declared queue record', () => {
    const config = parseConfig(TEST_TOPOLOGY);
    const queue = config.queues.get('random_queue');

    const source = config.workers.get('random_data_source');
    expect(source?.type).toBe('custom');
    expect(source?.properties.queue).toBe(queue);
    expect(source?.properties.rate).toBe(5);
    expect(source?.properties.target).toBe('skrode.ingesters.test:random');

    const mapper = config.workers.get('random_data_mapper');
    expect(mapper?.type).toBe('map');
    expect(mapper?.properties.source).toBe(queue);
  });

  it('defaults connection fields', () => {
    const config = parseConfig(`
redis: !skrode/redis {}
workers: []
`);
    expect(config.connections.get('redis')).toEqual({
      kind: 'connection',
      name: 'redis',
      host: 'localhost',
      port: 6379,
      db: 0,
    });
  });

  it('resolves references given as plain declaration names', () => {
    const config = parseConfig(`
workers: [mapper]
mapper:
  type: map
  target: pkg.mod:handle
  source: users
users: !skrode/queue
  conn: store
  key: /queue/users
  inflight: /queue/users/inflight
store: !skrode/redis
  host: cache.internal
  db: 2
`);
    const queue = config.queues.get('users');
    expect(queue?.connection).toBe(config.connections.get('store'));
    expect(queue?.connection.db).toBe(2);
    expect(queue?.inflight).toBe('/queue/users/inflight');
    expect(config.workers.get('mapper')?.properties.source).toBe(queue);
  });

  it('accepts an inline queue declaration on a worker', () => {
    const config = parseConfig(`
redis: &redis !skrode/redis
  host: localhost
mapper:
  type: map
  target: pkg.mod:handle
  source: !skrode/queue
    conn: *redis
    key: /queue/inline
workers: [mapper]
`);
    const queue = config.queues.get('mapper.source');
    expect(queue?.key).toBe('/queue/inline');
    expect(config.workers.get('mapper')?.properties.source).toBe(queue);
  });

  it('passes extra worker properties through, resolving aliases', () => {
    const config = parseConfig(`
redis: &redis !skrode/redis
  host: localhost
settings: &settings
  batch: 10
q: &q !skrode/queue
  conn: *redis
  key: /q
mapper:
  type: map
  target: pkg.mod:handle
  source: *q
  store: *redis
  tuning: *settings
  tags: [a, b]
workers: [mapper]
`);
    const props = config.workers.get('mapper')?.properties;
    expect(props?.store).toBe(config.connections.get('redis'));
    expect(props?.tuning).toEqual({ batch: 10 });
    expect(props?.tags).toEqual(['a', 'b']);
  });

  it('rejects a queue whose conn alias is undefined', () => {
    const yaml = `
random_queue: !skrode/queue
  conn: *redis
  key: /queue/random_data/ready
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow(ConfigError);
  });

  it('rejects a queue whose conn names no declaration', () => {
    const yaml = `
random_queue: !skrode/queue
  conn: nowhere
  key: /queue/random_data/ready
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow('"random_queue.conn" references undeclared connection: "nowhere"');
  });

  it('rejects a queue without conn', () => {
    const yaml = `
random_queue: !skrode/queue
  key: /queue/random_data/ready
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow('Queue "random_queue" is missing required property: "conn"');
  });

  it('rejects a reference to the wrong kind of declaration', () => {
    const yaml = `
redis: &redis !skrode/redis
  host: localhost
q: &q !skrode/queue
  conn: *redis
  key: /q
p:
  type: custom
  target: pkg.mod:make
  queue: *redis
  rate: 1
workers: [p]
`;
    expect(() => parseConfig(yaml)).toThrow('"p.queue" must reference a queue, but "redis" is a connection');
  });

  it('rejects a worker queue name that is not declared', () => {
    const yaml = `
p:
  type: custom
  target: pkg.mod:make
  queue: missing_queue
  rate: 1
workers: [p]
`;
    expect(() => parseConfig(yaml)).toThrow('"p.queue" references undeclared queue: "missing_queue"');
  });

  it('rejects an unknown worker type', () => {
    const yaml = `
w:
  type: reduce
  target: pkg.mod:fold
workers: [w]
`;
    expect(() => parseConfig(yaml)).toThrow('Worker "w" has unknown type: "reduce"');
  });

  it('rejects a document without a workers list', () => {
    expect(() => parseConfig('redis: !skrode/redis {}\n')).toThrow('Missing top-level "workers" list');
  });

  it('rejects a workers entry that is not a list of names', () => {
    expect(() => parseConfig('workers: nope\n')).toThrow('"workers" must be a list of worker names');
    expect(() => parseConfig('workers: [1]\n')).toThrow('"workers" must be a list of worker names');
  });

  it('rejects invalid connection fields', () => {
    const yaml = `
redis: !skrode/redis
  port: 70000
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow('Connection "redis" is invalid: port:');
  });

  it('rejects unknown connection fields', () => {
    const yaml = `
redis: !skrode/redis
  hostname: localhost
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow(ConfigError);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('workers: [a, b\n')).toThrow(/^Invalid YAML/);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n')).toThrow('Topology document must be a mapping of names to entries');
  });

  it('resolves ${ENV_VAR} placeholders from process.env', () => {
    process.env.TEST_REDIS_HOST = 'redis.internal';
    process.env.TEST_REDIS_PORT = '6380';

    const config = parseConfig(`
redis: !skrode/redis
  host: "\${TEST_REDIS_HOST}"
  port: "\${TEST_REDIS_PORT}"
workers: []
`);

    expect(config.connections.get('redis')?.host).toBe('redis.internal');
    expect(config.connections.get('redis')?.port).toBe(6380);

    delete process.env.TEST_REDIS_HOST;
    delete process.env.TEST_REDIS_PORT;
  });

  it('throws when env var is not set', () => {
    delete process.env.MISSING_VAR;

    const yaml = `
redis: !skrode/redis
  password: "\${MISSING_VAR}"
workers: []
`;
    expect(() => parseConfig(yaml)).toThrow('Environment variable MISSING_VAR is not set');
  });

  it('defaults runner settings', () => {
    const config = parseConfig('workers: []\n');
    expect(config.runner).toEqual({
      shutdown_timeout_ms: 10_000,
      restart: false,
      restart_delay_ms: 5000,
      retry: { max_retries: 5, base_delay_ms: 200, max_delay_ms: 5000 },
    });
  });

  it('parses a runner block', () => {
    const config = parseConfig(`
runner:
  restart: true
  retry:
    max_retries: 2
workers: []
`);
    expect(config.runner.restart).toBe(true);
    expect(config.runner.retry).toEqual({ max_retries: 2, base_delay_ms: 200, max_delay_ms: 5000 });
  });

  it('rejects an invalid runner block', () => {
    expect(() => parseConfig('runner:\n  restart: sometimes\nworkers: []\n')).toThrow(/^Invalid "runner" settings/);
  });

  it('schema defaults runner settings when not provided', () => {
    expect(runnerSettingsSchema.parse(undefined).shutdown_timeout_ms).toBe(10_000);
  });

  describe('loadConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = makeTmpDir();
    });

    afterEach(() => {
      rmSync(tmpDir, { recursive: true, force: true });
    });

    it('reads a topology file', () => {
      const configPath = join(tmpDir, 'config.yml');
      writeFileSync(configPath, TEST_TOPOLOGY);

      const config = loadConfig(configPath);
      expect(config.topology).toHaveLength(3);
    });

    it('throws ConfigError for a missing file', () => {
      expect(() => loadConfig(join(tmpDir, 'absent.yml'))).toThrow(ConfigError);
    });
  });

  describe('loadEnv', () => {
    it('applies defaults', () => {
      expect(loadEnv({})).toEqual({ SKRODE_CONFIG: 'config.yml', SKRODE_LOG_LEVEL: 'info' });
    });

    it('rejects an unknown log level', () => {
      expect(() => loadEnv({ SKRODE_LOG_LEVEL: 'verbose' })).toThrow();
    });
  });
});
