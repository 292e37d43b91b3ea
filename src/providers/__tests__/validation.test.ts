import { describe, it, expect } from 'vitest';
import { OllamaHostSchema, validateOllamaHostUrl } from '../validation.js';

describe('Ollama host validation', () => {
  it('accepts HTTP and HTTPS URLs', () => {
    expect(validateOllamaHostUrl('http://localhost:11434')).toEqual({ valid: true });
    expect(validateOllamaHostUrl('https://ollama.internal:8443/')).toEqual({ valid: true });
  });

  it('rejects strings that are not URLs', () => {
    const result = validateOllamaHostUrl('localhost-11434');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Ollama host URL');
      expect(result.setupInstructions).toContain('ollama serve');
    }
  });

  it('rejects non-HTTP schemes', () => {
    const result = OllamaHostSchema.safeParse('ftp://localhost:11434');

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Ollama host must be an HTTP(S) URL');
  });
});
