import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import {
  isSupportedLanguage,
  loadLanguageConfig,
  loadLlmConfig,
  loadMatcherConfig,
  loadProfilingPolicy,
  loadSessionConfig,
  validateLlmConfig,
  validateProfilingPolicy,
  type LlmConfig,
} from '../src/core/config.js';

const ENV_KEYS = [
  'PROFILE_MATCH_THRESHOLD',
  'PROFILE_COMPLETE_THRESHOLD',
  'MATCH_MAX_RESULTS',
  'MATCH_EXPLAIN_TOP_N',
  'SCHEME_CATALOG_PATH',
  'LLM_API_KEY',
  'LLM_BASE_URL',
  'LLM_MODEL',
  'LLM_MAX_TOKENS',
  'LLM_TEMPERATURE',
  'LLM_MAX_RETRIES',
  'SESSION_TTL_DAYS',
  'SESSION_HISTORY_LIMIT',
  'DEFAULT_LANGUAGE',
];
const saved: Record<string, string | undefined> = {};

beforeEach(() => {
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    if (saved[key] === undefined) delete process.env[key];
    else process.env[key] = saved[key];
  }
});

function makeLlmConfig(overrides: Partial<LlmConfig> = {}): LlmConfig {
  return { ...loadLlmConfig(), ...overrides };
}

// ============================================================================
// Profiling policy
// ============================================================================

describe('loadProfilingPolicy', () => {
  it('defaults to 0.5 for matching and 0.8 for completion', () => {
    expect(loadProfilingPolicy()).toEqual({ matchThreshold: 0.5, completeThreshold: 0.8 });
  });

  it('reads thresholds from the environment', () => {
    process.env.PROFILE_MATCH_THRESHOLD = '0.4';
    process.env.PROFILE_COMPLETE_THRESHOLD = '1';
    expect(loadProfilingPolicy()).toEqual({ matchThreshold: 0.4, completeThreshold: 1 });
  });

  it('falls back on unparseable values', () => {
    process.env.PROFILE_MATCH_THRESHOLD = 'half';
    expect(loadProfilingPolicy().matchThreshold).toBe(0.5);
  });
});

describe('validateProfilingPolicy', () => {
  it('accepts the defaults', () => {
    expect(() => validateProfilingPolicy(loadProfilingPolicy())).not.toThrow();
  });

  it('rejects a match threshold above the complete threshold', () => {
    expect(() =>
      validateProfilingPolicy({ matchThreshold: 0.9, completeThreshold: 0.8 }),
    ).toThrow(/matchThreshold must be <= completeThreshold/);
  });

  it('reports every problem at once', () => {
    expect(() =>
      validateProfilingPolicy({ matchThreshold: -0.1, completeThreshold: 1.5 }),
    ).toThrow(
      'Invalid profiling policy:\n' +
        '  - matchThreshold must be between 0 and 1\n' +
        '  - completeThreshold must be between 0 and 1',
    );
  });
});

// ============================================================================
// Matcher
// ============================================================================

describe('loadMatcherConfig', () => {
  it('defaults to seven results and the bundled catalog', () => {
    const config = loadMatcherConfig();
    expect(config.maxResults).toBe(7);
    expect(config.explainTopN).toBe(5);
    expect(path.basename(config.catalogPath)).toBe('central_schemes.json');
  });

  it('clamps the result limit', () => {
    process.env.MATCH_MAX_RESULTS = '500';
    expect(loadMatcherConfig().maxResults).toBe(50);
    process.env.MATCH_MAX_RESULTS = '0';
    expect(loadMatcherConfig().maxResults).toBe(1);
  });

  it('ignores a non-integer limit', () => {
    process.env.MATCH_MAX_RESULTS = '3.5';
    expect(loadMatcherConfig().maxResults).toBe(7);
  });

  it('resolves a custom catalog path', () => {
    process.env.SCHEME_CATALOG_PATH = 'custom/schemes.json';
    expect(loadMatcherConfig().catalogPath).toBe(path.resolve('custom/schemes.json'));
  });
});

// ============================================================================
// Text generation
// ============================================================================

describe('loadLlmConfig', () => {
  it('leaves the key unset when blank', () => {
    process.env.LLM_API_KEY = '   ';
    const config = loadLlmConfig();
    expect(config.apiKey).toBeUndefined();
    expect(config.model).toBe('gpt-4o-mini');
  });

  it('caps retries at five', () => {
    process.env.LLM_MAX_RETRIES = '9';
    expect(loadLlmConfig().maxRetries).toBe(5);
  });
});

describe('validateLlmConfig', () => {
  it('accepts the defaults', () => {
    expect(() => validateLlmConfig(makeLlmConfig())).not.toThrow();
  });

  it('requires an https base URL', () => {
    expect(() =>
      validateLlmConfig(makeLlmConfig({ baseUrl: 'http://localhost:8080/v1' })),
    ).toThrow(/baseUrl must start with https/);
  });

  it('rejects out-of-range sampling settings', () => {
    let message = '';
    try {
      validateLlmConfig(makeLlmConfig({ maxTokens: 0, temperature: 3 }));
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).toContain('maxTokens must be between 1 and 32000');
    expect(message).toContain('temperature must be between 0 and 2');
  });
});

// ============================================================================
// Sessions and languages
// ============================================================================

describe('loadSessionConfig', () => {
  it('defaults to a 30-day TTL and 20 stored messages', () => {
    const config = loadSessionConfig();
    expect(config.ttlDays).toBe(30);
    expect(config.historyLimit).toBe(20);
    expect(config.recentWindow).toBe(10);
  });

  it('keeps the TTL within a year', () => {
    process.env.SESSION_TTL_DAYS = '1000';
    expect(loadSessionConfig().ttlDays).toBe(365);
  });
});

describe('loadLanguageConfig', () => {
  it('defaults to Hindi', () => {
    expect(loadLanguageConfig().defaultLanguage).toBe('hi');
  });

  it('accepts a supported default and ignores an unsupported one', () => {
    process.env.DEFAULT_LANGUAGE = 'ta';
    expect(loadLanguageConfig().defaultLanguage).toBe('ta');
    process.env.DEFAULT_LANGUAGE = 'fr';
    expect(loadLanguageConfig().defaultLanguage).toBe('hi');
  });

  it('ignores object property names as a default', () => {
    process.env.DEFAULT_LANGUAGE = 'constructor';
    expect(loadLanguageConfig().defaultLanguage).toBe('hi');
  });
});

describe('isSupportedLanguage', () => {
  it('matches own language codes only', () => {
    expect(isSupportedLanguage('ta')).toBe(true);
    expect(isSupportedLanguage('constructor')).toBe(false);
    expect(isSupportedLanguage('hasOwnProperty')).toBe(false);
    expect(isSupportedLanguage('en', { hi: 'Hindi' })).toBe(false);
  });
});
