/**
 * Ollama Text-Generation Client
 *
 * Thin client for a local Ollama server:
 * - generate(): one blocking POST /api/chat with stream disabled
 * - isAvailable() / listModels(): GET /api/tags
 *
 * No retries, streaming or caching. Any transport or model failure
 * surfaces as a GenerationError carrying the underlying error.
 */

import { z } from 'zod';

import { getOllamaHost } from '../config/env.js';
import { ConfigError, GenerationError, toError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import { validateOllamaHostUrl } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Anything that turns a prompt into text. The batch analyzer and the CLI
 * depend on this, not on OllamaClient, so tests can pass a fake.
 */
export interface TextGenerator {
  generate(prompt: string, model?: string): Promise<string>;
}

export interface OllamaClientOptions {
  /**
   * Ollama server URL.
   * @default OLLAMA_HOST, or http://localhost:11434
   */
  host?: string;

  /**
   * Model used when generate() is called without one.
   * @default 'llama3'
   */
  model?: string;

  /**
   * Request timeout in milliseconds.
   * @default 120000
   */
  timeoutMs?: number;
}

export interface CreateOllamaClientOptions extends OllamaClientOptions {
  /**
   * Skip the server check after creation.
   * @default false
   */
  skipAvailabilityCheck?: boolean;
}

interface ChatRequest {
  model: string;
  messages: Array<{ role: 'user'; content: string }>;
  stream: false;
}

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const ErrorBodySchema = z.object({ error: z.string() });

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OLLAMA_MODEL = 'llama3';

/** Local models can be slow, especially on first load */
export const DEFAULT_OLLAMA_TIMEOUT = 120000;

/** Availability probes should fail fast */
const PROBE_TIMEOUT = 5000;

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Extract the message from an error body, or fall back to the raw text.
 */
function errorDetail(body: string): string {
  const parsed = ErrorBodySchema.safeParse(safeJsonParse(body));
  if (parsed.success) {
    return parsed.data.error;
  }
  return body.trim() || 'empty response';
}

export class OllamaClient implements TextGenerator {
  readonly host: string;
  readonly model: string;
  private readonly timeoutMs: number;

  /**
   * @throws ConfigError if the host is not an HTTP(S) URL
   */
  constructor(options: OllamaClientOptions = {}) {
    const host = options.host ?? getOllamaHost();
    const validation = validateOllamaHostUrl(host);
    if (!validation.valid) {
      throw new ConfigError(`${validation.error}: ${host}`, validation.setupInstructions);
    }

    this.host = host.replace(/\/+$/, '');
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_OLLAMA_TIMEOUT;
  }

  /**
   * Send one prompt and return the generated text.
   *
   * @throws GenerationError when the server is unreachable, times out,
   *   answers with an error status, or returns an unexpected body
   */
  async generate(prompt: string, model: string = this.model): Promise<string> {
    const body: ChatRequest = {
      model,
      messages: [{ role: 'user', content: prompt }],
      stream: false,
    };

    let response: Response;
    try {
      response = await fetch(`${this.host}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      const message =
        cause.name === 'TimeoutError'
          ? `Ollama did not answer within ${Math.round(this.timeoutMs / 1000)}s`
          : `Could not reach Ollama at ${this.host}: ${cause.message}`;
      throw new GenerationError(message, cause);
    }

    if (!response.ok) {
      const detail = errorDetail(await response.text());
      throw new GenerationError(
        `Ollama returned ${response.status}: ${detail}`,
        new Error(detail),
        response.status === 404 ? `Pull the model first: ollama pull ${model}` : undefined
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new GenerationError('Ollama returned a response that is not JSON', toError(error));
    }

    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GenerationError('Unexpected response from Ollama', parsed.error);
    }
    return parsed.data.message.content;
  }

  /**
   * Names of the models the server has pulled.
   *
   * @throws GenerationError when the server cannot be queried
   */
  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await fetch(`${this.host}/api/tags`, {
        signal: AbortSignal.timeout(PROBE_TIMEOUT),
      });
    } catch (error) {
      throw new GenerationError(`Could not reach Ollama at ${this.host}`, toError(error));
    }

    if (!response.ok) {
      throw new GenerationError(`Ollama returned ${response.status} for /api/tags`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new GenerationError('Ollama returned a response that is not JSON', toError(error));
    }

    const parsed = TagsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GenerationError('Unexpected response from Ollama', parsed.error);
    }
    return parsed.data.models.map((entry) => entry.name);
  }

  /**
   * True when the server answers /api/tags.
   */
  async isAvailable(): Promise<boolean> {
    return this.listModels().then(
      () => true,
      () => false
    );
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a client and, unless skipped, verify the server is running.
 *
 * @throws ConfigError if the host URL is invalid
 * @throws GenerationError if the server is not available
 *
 * @example
 * ```ts
 * const client = await createOllamaClient({ model: 'codellama' });
 * const explanation = await client.generate(prompt);
 * ```
 */
export async function createOllamaClient(
  options: CreateOllamaClientOptions = {}
): Promise<OllamaClient> {
  const client = new OllamaClient(options);

  if (!options.skipAvailabilityCheck && !(await client.isAvailable())) {
    throw new GenerationError(
      `Ollama server is not available at ${client.host}`,
      undefined,
      `Start the server with: ollama serve, then pull the model: ollama pull ${client.model}`
    );
  }

  return client;
}
