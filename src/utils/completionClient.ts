import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import { TextDecoder } from 'util';
import {
  ChatCompletionChunkSchema,
  ChatCompletionSchema,
  HYPOTHESES_RESPONSE_FORMAT,
  HypothesesSchema,
} from '../schemas/completion';
import type { HypothesisSuggestion } from '../types';
import { BadInputError, HypoForgeError, UpstreamError, errorMessage, isAbortError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('CompletionClient');

const CREDENTIAL_SUFFIX = 'hypoforge';

export interface CompletionSettings {
  apiBaseUrl: string;
  apiKey?: string;
  modelName: string;
  temperature: number;
}

export interface CompletionOverrides {
  apiBaseUrl?: string;
  apiKey?: string;
  modelName?: string;
}

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** Constrain the output to the hypotheses JSON schema. */
  structured?: boolean;
}

type StreamFrame = { kind: 'delta'; text: string } | { kind: 'done' } | { kind: 'skip' };

/**
 * Axios instance for the completion service, with request/response logging.
 */
export function createCompletionHttp(timeoutMs: number): AxiosInstance {
  const http = axios.create({
    timeout: timeoutMs,
    headers: {
      'Content-Type': 'application/json',
    },
  });

  http.interceptors.request.use((config) => {
    logger.debug(`API Request: ${config.method?.toUpperCase() ?? 'GET'} ${config.url ?? ''}`);
    return config;
  });

  http.interceptors.response.use(
    (response: AxiosResponse) => {
      logger.debug(`API Response: ${response.status} ${response.config.url ?? ''}`);
      return response;
    },
    (error: unknown) => {
      if (!axios.isCancel(error)) {
        logger.error('API Error:', errorMessage(error));
      }
      return Promise.reject(error);
    }
  );

  return http;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (data instanceof ArrayBuffer || data instanceof Uint8Array) {
    return Buffer.from(data).toString('utf-8');
  }
  return JSON.stringify(data ?? null);
}

function decodeChunk(chunk: unknown, decoder: TextDecoder): string {
  if (typeof chunk === 'string') {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return decoder.decode(chunk, { stream: true });
  }
  return '';
}

async function readAll(stream: Readable): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  for await (const chunk of stream) {
    text += decodeChunk(chunk, decoder);
  }
  return text + decoder.decode();
}

function parseFrame(line: string): StreamFrame {
  const trimmed = line.replace(/\r$/, '');
  if (!trimmed.startsWith('data:')) {
    return { kind: 'skip' };
  }
  const data = trimmed.slice('data:'.length).trim();
  if (data === '[DONE]') {
    return { kind: 'done' };
  }

  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch (error) {
    logger.debug(`Skipping malformed stream frame: ${errorMessage(error)}`);
    return { kind: 'skip' };
  }
  const parsed = ChatCompletionChunkSchema.safeParse(value);
  const text = parsed.success ? parsed.data.choices[0]?.delta?.content : undefined;
  return text ? { kind: 'delta', text } : { kind: 'skip' };
}

/**
 * Parse completion output constrained to the hypotheses schema.
 */
export function parseHypotheses(text: string): HypothesisSuggestion[] {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new UpstreamError(`Completion returned invalid JSON: ${errorMessage(error)}`, 502, text);
  }
  const parsed = HypothesesSchema.safeParse(value);
  if (!parsed.success) {
    throw new UpstreamError(`Completion returned malformed hypotheses: ${parsed.error.message}`, 502, text);
  }
  return parsed.data.hypotheses;
}

/**
 * Client for an OpenAI-compatible chat completions endpoint
 */
export class CompletionClient {
  constructor(
    readonly settings: CompletionSettings,
    private readonly http: AxiosInstance = createCompletionHttp(120_000)
  ) {}

  /**
   * Derive a client for per-call endpoint settings; the HTTP instance is shared.
   */
  withOverrides(overrides: CompletionOverrides = {}): CompletionClient {
    return new CompletionClient(
      {
        ...this.settings,
        apiBaseUrl: overrides.apiBaseUrl ?? this.settings.apiBaseUrl,
        apiKey: overrides.apiKey ?? this.settings.apiKey,
        modelName: overrides.modelName ?? this.settings.modelName,
      },
      this.http
    );
  }

  /**
   * Single-shot completion. Returns the message content.
   */
  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.post<unknown>(request, false, { signal });
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(
        `Completion service returned ${response.status}`,
        response.status,
        bodyText(response.data)
      );
    }

    const parsed = ChatCompletionSchema.safeParse(response.data);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (typeof content !== 'string') {
      throw new UpstreamError('Completion response has no message content', 502, bodyText(response.data));
    }
    return content;
  }

  async completeHypotheses(request: CompletionRequest, signal?: AbortSignal): Promise<HypothesisSuggestion[]> {
    const content = await this.complete({ ...request, structured: true }, signal);
    return parseHypotheses(content);
  }

  /**
   * Streaming completion. Yields the accumulated content after every frame
   * that carries text, so the last value is the full response.
   */
  async *stream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    const response = await this.post<Readable>(request, true, { responseType: 'stream', signal });
    const stream = response.data;

    try {
      if (response.status < 200 || response.status >= 300) {
        const body = await readAll(stream);
        throw new UpstreamError(`Completion service returned ${response.status}`, response.status, body);
      }

      const decoder = new TextDecoder();
      let buffer = '';
      let content = '';
      for await (const chunk of stream) {
        buffer += decodeChunk(chunk, decoder);
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';
        for (const line of lines) {
          const frame = parseFrame(line);
          if (frame.kind === 'done') {
            return;
          }
          if (frame.kind === 'delta') {
            content += frame.text;
            yield content;
          }
        }
      }

      const tail = parseFrame(buffer + decoder.decode());
      if (tail.kind === 'delta') {
        content += tail.text;
        yield content;
      }
    } catch (error) {
      if (signal?.aborted || isAbortError(error) || error instanceof HypoForgeError) {
        throw error;
      }
      throw new UpstreamError(`Completion stream failed: ${errorMessage(error)}`, 502, '');
    } finally {
      stream.destroy();
    }
  }

  private requestBody(request: CompletionRequest, stream: boolean): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.settings.modelName,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      temperature: this.settings.temperature,
    };
    if (stream) {
      body.stream = true;
    }
    if (request.structured) {
      body.response_format = { type: 'json_schema', json_schema: HYPOTHESES_RESPONSE_FORMAT };
    }
    return body;
  }

  private async post<T>(
    request: CompletionRequest,
    stream: boolean,
    config: AxiosRequestConfig
  ): Promise<AxiosResponse<T>> {
    const { apiKey, apiBaseUrl } = this.settings;
    if (!apiKey) {
      throw new BadInputError('API key is required');
    }

    try {
      return await this.http.post<T>(`${apiBaseUrl.replace(/\/+$/, '')}/chat/completions`, this.requestBody(request, stream), {
        ...config,
        headers: { Authorization: `Bearer ${apiKey}:${CREDENTIAL_SUFFIX}` },
        validateStatus: () => true,
      });
    } catch (error) {
      if (config.signal?.aborted || axios.isCancel(error) || isAbortError(error)) {
        throw error;
      }
      throw new UpstreamError(`Completion request failed: ${errorMessage(error)}`, 502, '');
    }
  }
}
