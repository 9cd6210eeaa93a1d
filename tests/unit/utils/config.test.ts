import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEngineConfig, validateEngineConfig } from '../../../src/utils/config-loader.js';
import { loadEngineConfigFile, parseConfigFile } from '../../../src/utils/config-parser.js';
import { ConfigError, FileIOError } from '../../../src/utils/errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../src/types/config.js';

describe('Engine config', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'modelsmith-config-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    expect(loadEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should prefer options over the file section', () => {
    const config = loadEngineConfig(
      { deduplicate: false },
      { nameScope: 'document', deduplicate: true },
    );
    expect(config.deduplicate).toBe(false);
    expect(config.nameScope).toBe('document');
    expect(config.allOfPolicy).toBe('inheritance');
  });

  it('should reject unknown keys', () => {
    expect(() => validateEngineConfig({ bogus: 1 })).toThrow(ConfigError);
    expect(() => validateEngineConfig({ bogus: 1 })).toThrow(
      'Invalid engine configuration: / must NOT have additional properties',
    );
  });

  it('should reject values outside an enumeration', () => {
    expect(() => validateEngineConfig({ allOfPolicy: 'merge' })).toThrow(
      'Invalid engine configuration: /allOfPolicy must be equal to one of the allowed values',
    );
  });

  it('should reject definition collections that are not fragment pointers', () => {
    expect(() => validateEngineConfig({ definitionCollections: ['$defs'] })).toThrow(ConfigError);
  });

  it('should read the engine section of a YAML file', () => {
    const filePath = join(dir, 'modelsmith.yaml');
    writeFileSync(
      filePath,
      ['engine:', '  allOfPolicy: flatten', '  reservedNames:', '    - Model', ''].join('\n'),
    );

    const config = loadEngineConfigFile(filePath, { fieldNameStyle: 'snake' });
    expect(config.allOfPolicy).toBe('flatten');
    expect(config.reservedNames).toEqual(['Model']);
    expect(config.fieldNameStyle).toBe('snake');
  });

  it('should read JSON files and treat empty YAML as empty', () => {
    const jsonPath = join(dir, 'modelsmith.json');
    writeFileSync(jsonPath, JSON.stringify({ engine: { deduplicate: false } }));
    expect(parseConfigFile(jsonPath)).toEqual({ engine: { deduplicate: false } });

    const emptyPath = join(dir, 'empty.yml');
    writeFileSync(emptyPath, '');
    expect(parseConfigFile(emptyPath)).toEqual({});
  });

  it('should reject unsupported extensions and missing files', () => {
    const tomlPath = join(dir, 'modelsmith.toml');
    writeFileSync(tomlPath, 'x = 1');
    expect(() => parseConfigFile(tomlPath)).toThrow(ConfigError);
    expect(() => parseConfigFile(join(dir, 'missing.json'))).toThrow(FileIOError);
  });
});
