import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import {
  ConfigError,
  applyEnvOverrides,
  loadConfigFromFile,
  parseConfigFromYaml,
} from '../../src/config/config-loader.js';

const MINIMAL_YAML = `
completion:
  baseUrl: http://localhost:11434
  model: mistral
tools:
  serverUrl: http://localhost:8001/mcp
contextProvider:
  url: http://localhost:8000/get_ocs_prompt
`;

const CONFIG_FILE = fileURLToPath(new URL('../../config/copilot.yaml', import.meta.url));

describe('Config Loader', () => {
  describe('parseConfigFromYaml', () => {
    it('fills defaults', () => {
      const config = parseConfigFromYaml(MINIMAL_YAML, '/etc/ops/copilot.yaml', {});

      expect(config.completion).toEqual({
        baseUrl: 'http://localhost:11434',
        model: 'mistral',
        maxTokens: 1000,
        temperature: 0,
        timeoutMs: 300000,
        apiKey: 'ollama',
      });
      expect(config.tools).toEqual({
        serverUrl: 'http://localhost:8001/mcp',
        catalogPath: '/etc/ops/tool-catalog.json',
        timeoutMs: 60000,
      });
      expect(config.contextProvider.timeoutMs).toBe(30000);
      expect(config.planner.maxSteps).toBe(3);
    });

    it('keeps absolute catalog paths', () => {
      const yaml = MINIMAL_YAML.replace(
        'serverUrl: http://localhost:8001/mcp',
        'serverUrl: http://localhost:8001/mcp\n  catalogPath: /opt/catalog.json'
      );
      expect(parseConfigFromYaml(yaml, '/etc/ops/copilot.yaml', {}).tools.catalogPath).toBe('/opt/catalog.json');
    });

    it('applies trimmed environment overrides and skips empty ones', () => {
      const config = parseConfigFromYaml(MINIMAL_YAML, '/etc/ops/copilot.yaml', {
        OLLAMA_URL: ' http://ollama:11434 ',
        OLLAMA_MODEL: '',
        MCP_SERVER_URL: 'http://tools:8001/mcp',
      });

      expect(config.completion.baseUrl).toBe('http://ollama:11434');
      expect(config.completion.model).toBe('mistral');
      expect(config.tools.serverUrl).toBe('http://tools:8001/mcp');
    });

    it('reports missing sections', () => {
      const yaml = MINIMAL_YAML.replace(/completion:\n.*\n.*\n/, '');
      expect(() => parseConfigFromYaml(yaml, 'copilot.yaml', {})).toThrow(/completion: Required/);
    });

    it('rejects unknown top-level keys', () => {
      expect(() => parseConfigFromYaml(`${MINIMAL_YAML}\nextra: 1\n`, 'copilot.yaml', {})).toThrow(
        /Unrecognized key/
      );
    });

    it('rejects planner limits outside 1..10', () => {
      expect(() =>
        parseConfigFromYaml(`${MINIMAL_YAML}\nplanner:\n  maxSteps: 0\n`, 'copilot.yaml', {})
      ).toThrow(ConfigError);
    });

    it('rejects documents that are not mappings', () => {
      expect(() => parseConfigFromYaml('- a\n- b\n', 'copilot.yaml', {})).toThrow(
        'Configuration must be a YAML mapping'
      );
      expect(() => parseConfigFromYaml('', 'copilot.yaml', {})).toThrow('Configuration must be a YAML mapping');
    });

    it('reports YAML syntax errors', () => {
      expect(() => parseConfigFromYaml('completion: [unclosed', 'copilot.yaml', {})).toThrow(
        /^Failed to parse YAML/
      );
    });
  });

  it('does not mutate the raw document when overriding', () => {
    const raw = { completion: { model: 'mistral' } };
    const merged = applyEnvOverrides(raw, { OLLAMA_MODEL: 'llama3' });

    expect(merged).toEqual({ completion: { model: 'llama3' } });
    expect(raw).toEqual({ completion: { model: 'mistral' } });
  });

  describe('loadConfigFromFile', () => {
    it('loads the bundled configuration', async () => {
      const config = await loadConfigFromFile(CONFIG_FILE, {});

      expect(config.completion.model).toBe('mistral');
      expect(config.tools.catalogPath).toBe(join(dirname(CONFIG_FILE), 'tool-catalog.json'));
    });

    it('reports unreadable files', async () => {
      await expect(loadConfigFromFile('/nonexistent/copilot.yaml', {})).rejects.toThrow(/^Failed to read file/);
    });
  });
});
