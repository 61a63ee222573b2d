import { writeFileSync, unlinkSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { loadConfig, loadProjectConfig } from '@/config/index.js';

import { createTestProject, expectErrorCode, type TestProject } from '../helpers/project.js';

const TEST_CONFIG_DIR = join(process.cwd(), 'tests', 'fixtures');
const TEST_CONFIG_PATH = join(TEST_CONFIG_DIR, 'test-config.json');

describe('Config Loading', () => {
  beforeEach(() => {
    if (!existsSync(TEST_CONFIG_DIR)) {
      mkdirSync(TEST_CONFIG_DIR, { recursive: true });
    }
  });

  afterEach(() => {
    if (existsSync(TEST_CONFIG_PATH)) {
      unlinkSync(TEST_CONFIG_PATH);
    }
  });

  it('should load valid config with defaults', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({}));
    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.logging.level).toBe('info');
    expect(config.logging.pretty).toBe(false);
    expect(config.sources.versionScript).toBe('version.sh');
    expect(config.sources.metadataFile).toBe('PKG-INFO');
    expect(config.distribution.dataFiles).toEqual(['version.json']);
    expect(config.distribution.scripts).toEqual(['bin/storage']);
    expect(config.distribution.packageMarker).toBe('index.ts');
    expect(config.distribution.installRequires).toEqual([]);
  });

  it('should override defaults with provided values', () => {
    const customConfig = {
      logging: { level: 'debug' },
      sources: { metadataFile: 'META' },
      distribution: { author: 'Storage Team', scripts: ['bin/storage-cli'] },
    };
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify(customConfig));
    const config = loadConfig(TEST_CONFIG_PATH);

    expect(config.logging.level).toBe('debug');
    expect(config.sources.metadataFile).toBe('META');
    expect(config.sources.versionScript).toBe('version.sh');
    expect(config.distribution.author).toBe('Storage Team');
    expect(config.distribution.scripts).toEqual(['bin/storage-cli']);
  });

  it('should throw ConfigMissingError for non-existent file', () => {
    expectErrorCode(() => loadConfig('/nonexistent/path/config.json'), 'CONFIG_MISSING');
  });

  it('should throw ConfigParseError for invalid JSON', () => {
    writeFileSync(TEST_CONFIG_PATH, 'not valid json');
    expectErrorCode(() => loadConfig(TEST_CONFIG_PATH), 'CONFIG_PARSE_ERROR');
  });

  it('should throw ConfigInvalidError for invalid schema', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ logging: { pretty: 'yes' } }));
    expectErrorCode(() => loadConfig(TEST_CONFIG_PATH), 'CONFIG_INVALID');
  });

  it('should validate logging level enum', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ logging: { level: 'verbose' } }));
    expectErrorCode(() => loadConfig(TEST_CONFIG_PATH), 'CONFIG_INVALID');
  });

  it('should require exactly one script entry point', () => {
    writeFileSync(
      TEST_CONFIG_PATH,
      JSON.stringify({ distribution: { scripts: ['bin/a', 'bin/b'] } })
    );
    expectErrorCode(() => loadConfig(TEST_CONFIG_PATH), 'CONFIG_INVALID');
  });

  it('should reject an empty metadata file name', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ sources: { metadataFile: '' } }));
    expectErrorCode(() => loadConfig(TEST_CONFIG_PATH), 'CONFIG_INVALID');
  });

  it('should name the offending path in the error message', () => {
    writeFileSync(TEST_CONFIG_PATH, JSON.stringify({ sources: { metadataFile: 42 } }));
    expect(() => loadConfig(TEST_CONFIG_PATH)).toThrow('sources.metadataFile');
  });
});

describe('loadProjectConfig()', () => {
  let project: TestProject;

  beforeEach(() => {
    project = createTestProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('should fall back to defaults when the project has no config file', () => {
    const config = loadProjectConfig(project.root);

    expect(config.sources.versionScript).toBe('version.sh');
    expect(config.distribution.urlTemplate).toBe('https://github.com/storage-tools/{name}');
  });

  it('should read distmeta.config.json from the project root', () => {
    project.write('distmeta.config.json', JSON.stringify({ distribution: { license: 'MIT' } }));

    expect(loadProjectConfig(project.root).distribution.license).toBe('MIT');
  });
});
