import Anthropic from '@anthropic-ai/sdk';
import { ApiError, GoogleGenAI, SafetyFilterLevel } from '@google/genai';
import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { withRetry, withTimeout } from '../../utils/retry.js';
import type { AIResponse, GeneratedImage, GenerateOptions, ImageOptions, TokenUsage } from './types.js';

const logger = createLogger('ai-clients');

const CLAUDE_TIMEOUT_MESSAGE = 'Request timed out - the content may be too complex';
const IMAGEN_TIMEOUT_MESSAGE = 'Request timed out';

// ---------------------------------------------------------------------------
// Lazy-initialized clients
// ---------------------------------------------------------------------------
let anthropicClient: Anthropic | null = null;
let googleClient: GoogleGenAI | null = null;

export function isClaudeConfigured(): boolean {
  return config.apiKeys.anthropic !== '';
}

export function isImagenConfigured(): boolean {
  return config.google.project !== '' || config.apiKeys.googleAi !== '';
}

function getAnthropicClient(): Anthropic {
  if (!anthropicClient) {
    if (!isClaudeConfigured()) {
      throw new Error('Anthropic API key not configured');
    }
    // Retries and timeouts are handled here, not by the SDK
    anthropicClient = new Anthropic({ apiKey: config.apiKeys.anthropic, maxRetries: 0 });
  }
  return anthropicClient;
}

function getGoogleClient(): GoogleGenAI {
  if (!googleClient) {
    if (config.google.project) {
      googleClient = new GoogleGenAI({
        vertexai: true,
        project: config.google.project,
        location: config.google.location,
      });
    } else if (config.apiKeys.googleAi) {
      googleClient = new GoogleGenAI({ apiKey: config.apiKeys.googleAi });
    } else {
      throw new Error('Google Cloud credentials not configured');
    }
  }
  return googleClient;
}

/** Drop cached clients so the next call picks up changed configuration. */
export function resetClients(): void {
  anthropicClient = null;
  googleClient = null;
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------
function nestedErrorMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('error' in body)) return null;
  const inner = body.error;
  if (typeof inner !== 'object' || inner === null || !('message' in inner)) return null;
  return typeof inner.message === 'string' ? inner.message : null;
}

/**
 * Readable message for a failed Messages API call, keyed on HTTP status.
 */
export function claudeStatusMessage(status: number, body?: unknown): string {
  switch (status) {
    case 400:
      return `Invalid request: ${nestedErrorMessage(body) ?? 'Bad request'}`;
    case 401:
      return 'Authentication failed - check API key';
    case 429:
      return 'Rate limited - please try again later';
    case 500:
      return 'Claude API server error - please try again';
    case 529:
      return 'Claude API is overloaded - please try again later';
    default:
      return `Unexpected API error (status ${status})`;
  }
}

export function imagenStatusMessage(status: number, detail: string): string {
  switch (status) {
    case 400:
      return `Invalid request: ${detail}`;
    case 401:
      return 'Authentication failed - check credentials';
    case 403:
      return 'Permission denied - check service account permissions';
    case 429:
      return 'Rate limited - please try again later';
    default:
      return `API error (status ${status})`;
  }
}

function describeClaudeError(error: unknown): string {
  if (error instanceof Anthropic.APIConnectionTimeoutError) return CLAUDE_TIMEOUT_MESSAGE;
  if (error instanceof Anthropic.APIConnectionError) return 'Failed to connect to Claude API';
  if (error instanceof Anthropic.APIError && error.status !== undefined) {
    return claudeStatusMessage(error.status, error.error);
  }
  return error instanceof Error ? error.message : String(error);
}

function describeImagenError(error: unknown): string {
  if (error instanceof ApiError) return imagenStatusMessage(error.status, error.message);
  return error instanceof Error ? error.message : String(error);
}

function isRetryableClaudeError(error: Error): boolean {
  return error instanceof Anthropic.APIError && (error.status === 429 || error.status === 529);
}

function isRetryableImagenError(error: Error): boolean {
  return error instanceof ApiError && error.status === 429;
}

// ---------------------------------------------------------------------------
// generateWithClaude
// ---------------------------------------------------------------------------
export async function generateWithClaude(
  prompt: string,
  options: GenerateOptions = {}
): Promise<AIResponse> {
  const model = options.model ?? config.ai.claude.model;
  const maxTokens = options.maxTokens ?? config.ai.claude.maxTokens;

  logger.info('Claude call', { model, promptLength: prompt.length });

  const startTime = performance.now();

  try {
    const response = await withRetry(
      async () => {
        const client = getAnthropicClient();
        return withTimeout(
          () =>
            client.messages.create({
              model,
              max_tokens: maxTokens,
              system: options.systemPrompt ?? '',
              messages: [{ role: 'user', content: prompt }],
              ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
            }),
          { timeoutMs: config.ai.claude.timeoutMs, message: CLAUDE_TIMEOUT_MESSAGE }
        );
      },
      {
        maxRetries: 3,
        baseDelayMs: 2000,
        retryOn: isRetryableClaudeError,
      }
    );

    const latencyMs = Math.round(performance.now() - startTime);

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    if (text === '') {
      throw new Error('Unexpected response format from Claude');
    }

    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    };

    logger.debug('Claude response received', {
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      latencyMs,
    });

    return {
      text,
      usage,
      model,
      finishReason: response.stop_reason ?? undefined,
      latencyMs,
    };
  } catch (error) {
    const message = describeClaudeError(error);
    logger.error('Claude generation failed', { model, error: message });
    throw new Error(message, { cause: error });
  }
}

// ---------------------------------------------------------------------------
// generateImage
// ---------------------------------------------------------------------------
export async function generateImage(
  prompt: string,
  options: ImageOptions = {}
): Promise<GeneratedImage> {
  const model = config.ai.imagen.model;
  const aspectRatio = options.aspectRatio ?? '16:9';
  // The Gemini API rejects the watermark flag; only Vertex AI takes it
  const onVertex = config.google.project !== '';

  logger.info('Imagen call', { model, aspectRatio, promptLength: prompt.length });

  const startTime = performance.now();

  try {
    const response = await withRetry(
      async () => {
        const client = getGoogleClient();
        return withTimeout(
          () =>
            client.models.generateImages({
              model,
              prompt,
              config: {
                numberOfImages: 1,
                aspectRatio,
                safetyFilterLevel: SafetyFilterLevel.BLOCK_MEDIUM_AND_ABOVE,
                ...(onVertex ? { addWatermark: false } : {}),
              },
            }),
          { timeoutMs: config.ai.imagen.timeoutMs, message: IMAGEN_TIMEOUT_MESSAGE }
        );
      },
      {
        maxRetries: 2,
        baseDelayMs: 2000,
        retryOn: isRetryableImagenError,
      }
    );

    const latencyMs = Math.round(performance.now() - startTime);
    const generated = response.generatedImages?.[0];
    const bytes = generated?.image?.imageBytes;

    if (!bytes) {
      const reason = generated?.raiFilteredReason;
      throw new Error(reason ? `Image blocked by safety filter: ${reason}` : 'Unexpected response format');
    }

    logger.debug('Imagen response received', { model, latencyMs });

    return {
      imageData: Buffer.from(bytes, 'base64'),
      mimeType: generated?.image?.mimeType ?? 'image/png',
      model,
      latencyMs,
    };
  } catch (error) {
    const message = describeImagenError(error);
    logger.error('Image generation failed', { model, error: message });
    throw new Error(message, { cause: error });
  }
}
