import type { Logger } from 'pino';

import { DutError, asDutError } from '../errors.js';
import { splitCommands, type CommandInput } from '../translate/commands.js';
import type { Reply } from '../translate/keyNormalizer.js';
import type { Translator } from '../translate/translator.js';

/** Structured command channel to one device; the connection itself is owned elsewhere. */
export interface CommandTransport {
  sendCommand(line: string): Promise<Reply>;
  sendCommands(lines: readonly string[]): Promise<Reply[]>;
}

export interface DeviceSessionOptions {
  transport: CommandTransport;
  dialect: string;
  translator?: Translator;
  logger?: Logger;
}

export interface SendOptions {
  translate?: boolean;
}

function assertKnownDialect(translator: Translator, dialect: string): void {
  if (!translator.hasDialect(dialect)) {
    throw new DutError(
      'UNKNOWN_DIALECT',
      `Translator does not know dialect "${dialect}" (known: ${translator.dialects.join(', ')})`,
      { details: { dialect } }
    );
  }
}

export class DeviceSession {
  private activeTranslator: Translator | undefined;

  constructor(private readonly options: DeviceSessionOptions) {
    if (options.translator) {
      assertKnownDialect(options.translator, options.dialect);
    }
    this.activeTranslator = options.translator;
  }

  get dialect(): string {
    return this.options.dialect;
  }

  get translator(): Translator | undefined {
    return this.activeTranslator;
  }

  setTranslator(translator: Translator): void {
    assertKnownDialect(translator, this.options.dialect);
    this.activeTranslator = translator;
  }

  private translatorFor(options: SendOptions): Translator | undefined {
    return options.translate === false ? undefined : this.activeTranslator;
  }

  private async exchange<T>(lines: readonly string[], send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      const wrapped = asDutError(error, 'TRANSPORT');
      this.options.logger?.debug({ dialect: this.dialect, lines, code: wrapped.code }, 'Command exchange failed');
      throw wrapped;
    }
  }

  /**
   * Sends one command and returns its reply. A command that translates to
   * several lines goes out as a batch, and the last reply is returned.
   */
  async sendCommand(command: string, options: SendOptions = {}): Promise<Reply> {
    const translator = this.translatorFor(options);
    const lines = this.linesFor(translator, command);
    const [first] = lines;

    const replies =
      lines.length === 1 && first !== undefined
        ? [await this.exchange(lines, () => this.options.transport.sendCommand(first))]
        : await this.sendBatch(lines);

    const last = replies.at(-1);
    if (last === undefined) {
      throw new DutError('BAD_REQUEST', 'Command is empty', { details: { dialect: this.dialect } });
    }
    return translator ? translator.translateResponse(this.dialect, last) : last;
  }

  async sendCommands(commands: CommandInput, options: SendOptions = {}): Promise<Reply[]> {
    const translator = this.translatorFor(options);
    const replies = await this.sendBatch(this.linesFor(translator, commands));
    return translator ? translator.translateResponses(this.dialect, replies) : replies;
  }

  private linesFor(translator: Translator | undefined, commands: CommandInput): string[] {
    return translator ? translator.translateCommands(this.dialect, commands) : splitCommands(commands);
  }

  private async sendBatch(lines: readonly string[]): Promise<Reply[]> {
    this.options.logger?.debug({ dialect: this.dialect, lines }, 'Sending commands');
    const replies = await this.exchange(lines, () => this.options.transport.sendCommands(lines));

    if (replies.length !== lines.length) {
      throw new DutError(
        'TRANSPORT',
        `Expected ${lines.length} replies but the device returned ${replies.length}`,
        { details: { dialect: this.dialect, lines, replyCount: replies.length } }
      );
    }
    return replies;
  }
}
