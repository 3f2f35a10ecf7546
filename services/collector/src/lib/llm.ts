/**
 * LLM Vision Integration
 *
 * Sends one rendered page at a time to an OpenAI vision model and parses the
 * structured reply. Unparsable or off-schema replies are reported as
 * non-matches (null), not as errors; transport failures propagate.
 */

import OpenAI from 'openai';
import {
  logger,
  config,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  validatePageInterpretation,
  ConfigurationError,
  REFERENCE_RATES_TEMPLATE,
  PAGE_INTERPRETATION_SCHEMA,
  type Config,
  type PageInterpretation,
} from '@ratekeeper/shared';

export interface PageInterpretationReply {
  /** Raw message content, null when the model returned none */
  content: string | null;
  requestId: string;
}

/**
 * A vision-capable service that reads one rendered page
 */
export interface PageInterpreter {
  readonly model: string;
  interpretPage(image: Buffer, pageNumber: number): Promise<PageInterpretationReply>;
}

export class OpenAiPageInterpreter implements PageInterpreter {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    readonly model: string,
    timeoutMs: number
  ) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs });
  }

  async interpretPage(image: Buffer, pageNumber: number): Promise<PageInterpretationReply> {
    const imageUrl = `data:image/jpeg;base64,${image.toString('base64')}`;

    logger.info('Interpreting page image', {
      model: this.model,
      pageNumber,
      image_size_bytes: image.length,
    });

    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image_url', image_url: { url: imageUrl } },
              { type: 'text', text: REFERENCE_RATES_TEMPLATE.userPrompt },
            ],
          },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: PAGE_INTERPRETATION_SCHEMA,
        },
        max_tokens: 4096,
        temperature: 0,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      const requestId = response.id || `req_${Date.now()}`;

      logger.info('Page interpretation complete', {
        model: this.model,
        request_id: requestId,
        pageNumber,
        duration_seconds: duration,
      });

      return { content: response.choices[0]?.message?.content ?? null, requestId };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      logger.error('Page interpretation request failed', error, {
        model: this.model,
        pageNumber,
      });

      throw error;
    }
  }
}

/**
 * Build the interpreter from configuration.
 * The API key is only needed once the image fallback is reached.
 */
export function createPageInterpreter(
  settings: Pick<Config, 'openaiApiKey' | 'llmModelVision' | 'llmRequestTimeoutMs'> = config
): PageInterpreter {
  if (!settings.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY not set in environment variables', 'OPENAI_API_KEY');
  }

  return new OpenAiPageInterpreter(
    settings.openaiApiKey,
    settings.llmModelVision,
    settings.llmRequestTimeoutMs
  );
}

/**
 * Strip a Markdown code fence some models wrap around JSON
 */
function unwrapCodeFence(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : content;
}

/**
 * Parse and validate a reply. Returns null for anything that is not a
 * well-formed page interpretation.
 */
export function parsePageInterpretation(
  content: string | null,
  pageNumber: number
): PageInterpretation | null {
  if (!content) {
    logger.warn('Empty page interpretation response', { pageNumber });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(unwrapCodeFence(content));
  } catch (error) {
    logger.warn('Failed to parse page interpretation response', {
      pageNumber,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const validation = validatePageInterpretation(parsed);
  if (!validation.valid) {
    logger.warn('Page interpretation response does not match schema', {
      pageNumber,
      errors: validation.errors,
    });
    return null;
  }

  return validation.value;
}
