import Anthropic from '@anthropic-ai/sdk';
import fs from 'fs/promises';
import { logger } from './logger.js';

export const MAX_REPLY_TOKENS = 180;
export const REPLY_TEMPERATURE = 0.7;

export const DEFAULT_PERSONA =
  'Ты опытный психолог-консультант по отношениям и чуткий слушатель. ' +
  'Отвечай на русском языке, тепло и эмпатично, отражай чувства собеседницы, ' +
  'задавай один мягкий уточняющий вопрос, если информации мало. ' +
  'Давай практичные и бережные рекомендации без давления. ' +
  'Не используй медицинские диагнозы и не заменяй профессиональную помощь.';

export type CompletionFailureReason =
  | 'request-failed'
  | 'timeout'
  | 'malformed-response'
  | 'empty-response';

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; reason: CompletionFailureReason; detail?: string };

export interface CompletionClient {
  complete(prompt: string): Promise<CompletionResult>;
}

/** The slice of the Anthropic SDK this client calls. */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<{
    content?: ReadonlyArray<{ type: string; text?: unknown }>;
  }>;
}

export interface ClaudeClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  personaFile?: string;
}

export class ClaudeClient implements CompletionClient {
  private messages: MessagesApi;
  private model: string;
  private personaFile?: string;
  private systemPrompt: string = DEFAULT_PERSONA;
  private initialized: boolean = false;

  constructor(options: ClaudeClientOptions, messages?: MessagesApi) {
    this.model = options.model;
    this.personaFile = options.personaFile;
    // The caller falls back to a tip on failure, so no SDK retries
    this.messages = messages ?? new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    }).messages;
  }

  private async loadSystemPrompt(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;

    if (!this.personaFile) return;

    try {
      const content = (await fs.readFile(this.personaFile, 'utf-8')).trim();
      if (content) {
        this.systemPrompt = content;
        logger.info('Claude', `Loaded persona from ${this.personaFile}`);
      } else {
        logger.warn('Claude', `Persona file ${this.personaFile} is empty, using built-in persona`);
      }
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn('Claude', `Could not read persona file ${this.personaFile}, using built-in persona`, { error: msg });
    }
  }

  /**
   * Send the persona plus one user turn and return the trimmed text of the
   * first content block. Never throws.
   */
  async complete(prompt: string): Promise<CompletionResult> {
    await this.loadSystemPrompt();

    let response: Awaited<ReturnType<MessagesApi['create']>>;
    try {
      response = await this.messages.create({
        model: this.model,
        max_tokens: MAX_REPLY_TOKENS,
        temperature: REPLY_TEMPERATURE,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      if (error instanceof Anthropic.APIConnectionTimeoutError) {
        return { ok: false, reason: 'timeout', detail };
      }
      return { ok: false, reason: 'request-failed', detail };
    }

    const first = response.content?.[0];
    if (!first || first.type !== 'text' || typeof first.text !== 'string') {
      return { ok: false, reason: 'malformed-response' };
    }

    const text = first.text.trim();
    if (!text) {
      return { ok: false, reason: 'empty-response' };
    }

    return { ok: true, text };
  }
}
