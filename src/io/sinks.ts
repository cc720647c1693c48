import { fetch, type Dispatcher } from 'undici';

import { DeliveryError } from '../core/errors.js';
import { delay } from './http.js';

/** Destination for report chunks and failure notices. */
export interface ReportSink {
  /** Deliver one message; rejects with `DeliveryError` once the sink gives up. */
  deliver(text: string): Promise<void>;
}

/** Telegram bot delivery settings. */
export interface TelegramSinkOptions {
  token: string;
  chatId: string;
  baseUrl?: string;
  /** Telegram `parse_mode`; plain text when omitted. */
  parseMode?: 'Markdown' | 'MarkdownV2' | 'HTML';
  dispatcher?: Dispatcher;
  retryDelayMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const TELEGRAM_BASE_URL = 'https://api.telegram.org';
const TELEGRAM_ATTEMPTS = 2;

/**
 * Posts each message to a chat through the Bot API `sendMessage` method.
 * A failed attempt is retried exactly once.
 */
export class TelegramSink implements ReportSink {
  private readonly options: TelegramSinkOptions;

  constructor(options: TelegramSinkOptions) {
    this.options = options;
  }

  async deliver(text: string): Promise<void> {
    const sleep = this.options.sleep ?? delay;
    let lastMessage = '';

    for (let attempt = 1; attempt <= TELEGRAM_ATTEMPTS; attempt += 1) {
      if (attempt > 1) {
        await sleep(this.options.retryDelayMs ?? 1000);
      }

      try {
        await this.send(text);
        return;
      } catch (error) {
        lastMessage = error instanceof Error ? error.message : String(error);
      }
    }

    throw new DeliveryError(`Telegram delivery failed after ${TELEGRAM_ATTEMPTS} attempts: ${lastMessage}`, TELEGRAM_ATTEMPTS);
  }

  /** One `sendMessage` call. Error messages never include the bot token. */
  private async send(text: string): Promise<void> {
    const baseUrl = this.options.baseUrl ?? TELEGRAM_BASE_URL;
    const body: Record<string, string | boolean> = {
      chat_id: this.options.chatId,
      text,
      disable_web_page_preview: true
    };
    if (this.options.parseMode) {
      body.parse_mode = this.options.parseMode;
    }

    const response = await fetch(`${baseUrl}/bot${this.options.token}/sendMessage`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
      dispatcher: this.options.dispatcher,
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000)
    });

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new Error(`sendMessage returned HTTP ${response.status}: ${detail}`);
    }
  }
}

/** Minimal writable surface used by `ConsoleSink`. */
export interface TextWriter {
  write(text: string): unknown;
}

/** Writes messages to a stream, separated by a rule line; used for dry runs. */
export class ConsoleSink implements ReportSink {
  private readonly writer: TextWriter;
  private delivered = 0;

  constructor(writer: TextWriter = process.stdout) {
    this.writer = writer;
  }

  async deliver(text: string): Promise<void> {
    if (this.delivered > 0) {
      this.writer.write('-----\n');
    }
    this.writer.write(`${text}\n`);
    this.delivered += 1;
  }
}

/** Collects messages in memory. */
export class MemorySink implements ReportSink {
  readonly messages: string[] = [];

  async deliver(text: string): Promise<void> {
    this.messages.push(text);
  }
}

/** Deliver chunks in order, stopping at the first failure. Returns the number sent. */
export async function deliverAll(chunks: readonly string[], sink: ReportSink): Promise<number> {
  let sent = 0;
  for (const chunk of chunks) {
    await sink.deliver(chunk);
    sent += 1;
  }
  return sent;
}
