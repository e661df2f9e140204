import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AgentConfigSchema,
  CogwheelConfigSchema,
  DEFAULT_CONFIG,
} from '../../src/types/config.js';
import {
  CONFIG_FILENAME,
  interpolateEnvVars,
  loadConfig,
  saveConfig,
} from '../../src/cli/utils/config.js';
import { setLogLevel } from '../../src/cli/utils/logger.js';
import { parseContextPairs } from '../../src/cli/commands/run.js';
import { ConfigError } from '../../src/core/errors.js';

describe('CogwheelConfigSchema', () => {
  it('should parse empty config with defaults', () => {
    const result = CogwheelConfigSchema.parse({});
    expect(result.model.name).toBe('claude-sonnet-4-20250514');
    expect(result.model.maxTokens).toBe(1024);
    expect(result.agent.maxIterations).toBe(10);
    expect(result.agent.oracleRetries).toBe(2);
    expect(result.agent.maxRunDurationMs).toBeUndefined();
    expect(result.tools.enabled).toEqual([
      'calculator',
      'string_analyzer',
      'list_processor',
      'json_formatter',
    ]);
  });

  it('should parse full config', () => {
    const result = CogwheelConfigSchema.parse({
      model: { name: 'claude-opus-4-20250514', maxTokens: 4096, temperature: 0.5 },
      agent: { maxIterations: 20, toolTimeoutMs: 1000, maxRunDurationMs: 60000 },
      tools: { enabled: ['calculator'] },
    });

    expect(result.model.name).toBe('claude-opus-4-20250514');
    expect(result.model.temperature).toBe(0.5);
    expect(result.agent.maxIterations).toBe(20);
    expect(result.agent.toolTimeoutMs).toBe(1000);
    expect(result.agent.oracleTimeoutMs).toBe(60000);
    expect(result.agent.maxRunDurationMs).toBe(60000);
    expect(result.tools.enabled).toEqual(['calculator']);
  });

  it('should reject invalid values', () => {
    expect(() => AgentConfigSchema.parse({ maxIterations: -1 })).toThrow();
    expect(() => AgentConfigSchema.parse({ maxIterations: 2.5 })).toThrow();
    expect(() =>
      CogwheelConfigSchema.parse({ tools: { enabled: ['web_search'] } })
    ).toThrow();
  });

  it('should match DEFAULT_CONFIG', () => {
    expect(DEFAULT_CONFIG).toEqual(CogwheelConfigSchema.parse({}));
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cogwheel-config-'));
    setLogLevel('error');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    setLogLevel('info');
    delete process.env.COGWHEEL_TEST_MODEL;
  });

  it('should return defaults when the file is missing', () => {
    expect(loadConfig(dir)).toEqual(DEFAULT_CONFIG);
  });

  it('should return defaults for an empty file', () => {
    writeFileSync(join(dir, CONFIG_FILENAME), '');

    expect(loadConfig(dir)).toEqual(DEFAULT_CONFIG);
  });

  it('should read YAML and fill in defaults', () => {
    writeFileSync(
      join(dir, CONFIG_FILENAME),
      'agent:\n  maxIterations: 4\ntools:\n  enabled:\n    - list_processor\n'
    );

    const config = loadConfig(dir);

    expect(config.agent.maxIterations).toBe(4);
    expect(config.agent.toolTimeoutMs).toBe(30000);
    expect(config.tools.enabled).toEqual(['list_processor']);
  });

  it('should interpolate environment variables', () => {
    process.env.COGWHEEL_TEST_MODEL = 'claude-test-model';
    writeFileSync(join(dir, CONFIG_FILENAME), 'model:\n  name: ${COGWHEEL_TEST_MODEL}\n');

    expect(loadConfig(dir).model.name).toBe('claude-test-model');
  });

  it('should report invalid fields with their path', () => {
    writeFileSync(join(dir, CONFIG_FILENAME), 'agent:\n  maxIterations: lots\n');

    expect(() => loadConfig(dir)).toThrow(ConfigError);
    expect(() => loadConfig(dir)).toThrow(
      `Invalid config in ${join(dir, CONFIG_FILENAME)}: agent.maxIterations: Expected number, received string`
    );
  });

  it('should round-trip through saveConfig', () => {
    const config = CogwheelConfigSchema.parse({ agent: { maxIterations: 7 } });

    saveConfig(dir, config);

    expect(loadConfig(dir)).toEqual(config);
  });
});

describe('interpolateEnvVars', () => {
  beforeEach(() => {
    setLogLevel('error');
  });

  afterEach(() => {
    setLogLevel('info');
    delete process.env.COGWHEEL_TEST_KEY;
  });

  it('should replace variables in nested values', () => {
    process.env.COGWHEEL_TEST_KEY = 'test-secret';

    expect(
      interpolateEnvVars({ a: '${COGWHEEL_TEST_KEY}', b: ['x-${COGWHEEL_TEST_KEY}', 3] })
    ).toEqual({ a: 'test-secret', b: ['x-test-secret', 3] });
  });

  it('should replace unset variables with an empty string', () => {
    expect(interpolateEnvVars('key=${COGWHEEL_TEST_KEY}')).toBe('key=');
  });
});

describe('parseContextPairs', () => {
  it('should decode JSON values and keep the rest as strings', () => {
    expect(
      parseContextPairs(['user=alice', 'count=3', 'flags={"a":true}', 'expr=a=b'])
    ).toEqual({ user: 'alice', count: 3, flags: { a: true }, expr: 'a=b' });
  });

  it('should reject entries without a key', () => {
    expect(() => parseContextPairs(['novalue'])).toThrow(ConfigError);
    expect(() => parseContextPairs(['=value'])).toThrow(
      'Context entries must look like key=value: =value'
    );
  });
});
