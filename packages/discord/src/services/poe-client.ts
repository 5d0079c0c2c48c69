import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import axios, { type AxiosInstance } from 'axios';
import { randomUUID } from 'crypto';
import { logger, DEFAULT_POE_BASE_URL, DEFAULT_MAX_SESSIONS } from '@poe-relay/shared';
import { ProviderError } from '../../types/errors.js';

export interface ProviderSettings {
  pointBalance: number | null;
}

export interface ModelInfo {
  handle: string;
  ownedBy: string | null;
  createdAt: Date | null;
}

/**
 * One piece of a streamed reply. sessionId identifies the conversation the
 * reply belongs to; it differs from the requested one when a new
 * conversation was opened.
 */
export interface ReplyFragment {
  text: string;
  sessionId: string;
}

export interface ChatProvider {
  listModels(): Promise<string[]>;
  getSettings(): Promise<ProviderSettings>;
  getModelInfo(handle: string): Promise<ModelInfo>;
  sendMessage(handle: string, prompt: string, sessionId: string | null): AsyncIterable<ReplyFragment>;
  breakSession(handle: string, sessionId: string): Promise<void>;
  /** Forget a session no guild refers to any more. Never fails. */
  releaseSession(sessionId: string): void;
}

export interface PoeClientOptions {
  apiKey: string;
  baseURL?: string;
  /** Transcripts kept before the least recently used is dropped. */
  maxSessions?: number;
}

interface BalanceResponse {
  current_point_balance?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Poe over its OpenAI-compatible API. The API itself is stateless, so
 * conversations are kept here as transcripts keyed by session id.
 */
export class PoeClient implements ChatProvider {
  private client: OpenAI;
  private http: AxiosInstance;
  private sessions = new Map<string, ChatCompletionMessageParam[]>();
  private readonly maxSessions: number;

  constructor(options: PoeClientOptions) {
    const baseURL = options.baseURL || DEFAULT_POE_BASE_URL;
    this.maxSessions = Math.max(1, options.maxSessions ?? DEFAULT_MAX_SESSIONS);

    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
    });

    // Usage endpoints live beside /v1, not under it
    this.http = axios.create({
      baseURL: new URL(baseURL).origin,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
      },
    });

    logger.info(`Poe client initialized against ${baseURL}`);
  }

  async listModels(): Promise<string[]> {
    try {
      const handles: string[] = [];
      for await (const model of this.client.models.list()) {
        handles.push(model.id);
      }
      logger.info('Retrieved available models successfully.');
      return handles;
    } catch (error) {
      throw new ProviderError(`Error fetching available models: ${errorMessage(error)}`, 'listModels');
    }
  }

  async getSettings(): Promise<ProviderSettings> {
    try {
      const response = await this.http.get<BalanceResponse>('/usage/current_balance');
      const balance = response.data.current_point_balance;
      logger.info('Retrieved Poe API settings successfully.');
      return { pointBalance: typeof balance === 'number' ? balance : null };
    } catch (error) {
      throw new ProviderError(`Error fetching Poe API settings: ${errorMessage(error)}`, 'getSettings');
    }
  }

  async getModelInfo(handle: string): Promise<ModelInfo> {
    try {
      const model = await this.client.models.retrieve(handle);
      logger.info(`Retrieved bot info for ${handle} successfully.`);
      return {
        handle: model.id,
        ownedBy: model.owned_by || null,
        createdAt: model.created ? new Date(model.created * 1000) : null,
      };
    } catch (error) {
      throw new ProviderError(`Error fetching bot info for ${handle}: ${errorMessage(error)}`, 'getModelInfo', {
        model: handle,
      });
    }
  }

  /**
   * Stream a reply. Unknown or missing session ids (including ones left
   * over from before a restart) start a new conversation.
   */
  async *sendMessage(handle: string, prompt: string, sessionId: string | null): AsyncGenerator<ReplyFragment> {
    const activeId = sessionId && this.sessions.has(sessionId) ? sessionId : randomUUID();
    if (activeId !== sessionId) {
      logger.info(`Opening new Poe conversation ${activeId} with ${handle}`);
    }

    const messages: ChatCompletionMessageParam[] = [
      ...(this.sessions.get(activeId) ?? []),
      { role: 'user', content: prompt },
    ];

    let reply = '';
    try {
      const stream = await this.client.chat.completions.create({
        model: handle,
        messages,
        stream: true,
      });

      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content ?? '';
        if (!text) {
          continue;
        }
        reply += text;
        yield { text, sessionId: activeId };
      }
    } catch (error) {
      throw new ProviderError(`Error sending message to ${handle}: ${errorMessage(error)}`, 'sendMessage', {
        model: handle,
        sessionId: activeId,
      });
    }

    this.remember(activeId, [...messages, { role: 'assistant', content: reply }]);
  }

  /** Number of conversations currently held in memory. */
  get sessionCount(): number {
    return this.sessions.size;
  }

  // Map order doubles as recency order
  private remember(sessionId: string, transcript: ChatCompletionMessageParam[]): void {
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, transcript);

    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
      logger.info(`Evicted idle Poe conversation ${oldest.value}`);
    }
  }

  async breakSession(handle: string, sessionId: string): Promise<void> {
    if (!this.sessions.delete(sessionId)) {
      logger.debug(`No transcript held for ${sessionId} (${handle}), nothing to break`);
      return;
    }
    logger.info(`Cleared conversation context ${sessionId} for ${handle}`);
  }

  releaseSession(sessionId: string): void {
    if (this.sessions.delete(sessionId)) {
      logger.debug(`Released conversation ${sessionId}`);
    }
  }
}
