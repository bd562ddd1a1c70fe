import type { Logger } from 'pino';

import type { KeyCollisionPolicy } from '../config.js';
import { DutError } from '../errors.js';
import { splitCommands, type CommandInput } from './commands.js';
import { camelToSnake, normalizeKeys, type KeyTransform, type Reply } from './keyNormalizer.js';
import { applyRules, compileRules, type CompiledRule, type RuleSpec } from './patternMatcher.js';

export interface DialectDefinition {
  rules: readonly RuleSpec[];
  transformKey?: KeyTransform;
}

export interface TranslatorOptions {
  canonicalDialect?: string;
  dialects: Readonly<Record<string, DialectDefinition>>;
  transformKey?: KeyTransform;
  keyCollision?: KeyCollisionPolicy;
  logger?: Logger;
}

export interface DialectExtension {
  before?: readonly RuleSpec[];
  after?: readonly RuleSpec[];
  transformKey?: KeyTransform;
}

interface DialectProfile {
  rules: readonly CompiledRule[];
  transformKey: KeyTransform;
}

export const DEFAULT_CANONICAL_DIALECT = 'eos';

/**
 * Rewrites canonical command lines into a device dialect and normalizes the
 * device's reply keys back to the canonical convention. Rule tables are compiled
 * once here and never change; `extend` builds a new Translator instead.
 */
export class Translator {
  readonly canonicalDialect: string;
  readonly keyCollision: KeyCollisionPolicy;
  private readonly profiles: ReadonlyMap<string, DialectProfile>;

  constructor(private readonly options: TranslatorOptions) {
    this.canonicalDialect = options.canonicalDialect ?? DEFAULT_CANONICAL_DIALECT;
    this.keyCollision = options.keyCollision ?? 'error';

    const defaultTransform = options.transformKey ?? camelToSnake;
    const profiles = new Map<string, DialectProfile>();
    for (const [dialect, definition] of Object.entries(options.dialects)) {
      if (dialect === this.canonicalDialect) {
        throw new DutError('CONFIG', `The canonical dialect "${dialect}" cannot carry a rule table`, {
          details: { dialect }
        });
      }
      profiles.set(dialect, {
        rules: compileRules(definition.rules),
        transformKey: definition.transformKey ?? defaultTransform
      });
    }
    this.profiles = profiles;
  }

  get dialects(): string[] {
    return [this.canonicalDialect, ...this.profiles.keys()];
  }

  hasDialect(dialect: string): boolean {
    return dialect === this.canonicalDialect || this.profiles.has(dialect);
  }

  private profileFor(dialect: string): DialectProfile {
    const profile = this.profiles.get(dialect);
    if (!profile) {
      throw new DutError(
        'UNKNOWN_DIALECT',
        `No rule table registered for dialect "${dialect}" (known: ${this.dialects.join(', ')})`,
        { details: { dialect } }
      );
    }
    return profile;
  }

  private rewriteLine(dialect: string, rules: readonly CompiledRule[], line: string, index: number): string {
    const outcome = applyRules(line, rules);
    if (outcome.kind === 'untranslatable') {
      throw new DutError(
        'UNTRANSLATABLE_COMMAND',
        `Command "${line}" (line ${index + 1}) has no ${dialect} equivalent (rule ${outcome.rule.index} /${outcome.rule.source}/)`,
        { details: { dialect, line, index, rule: outcome.rule.index } }
      );
    }
    return outcome.line;
  }

  translateCommands(dialect: string, commands: CommandInput): string[] {
    const lines = splitCommands(commands);
    if (dialect === this.canonicalDialect) {
      return lines;
    }

    const { rules } = this.profileFor(dialect);
    const translated = lines.map((line, index) => this.rewriteLine(dialect, rules, line, index));

    if (translated.some((line, index) => line !== lines[index])) {
      this.options.logger?.debug({ dialect, before: lines, after: translated }, 'Translated commands');
    }
    return translated;
  }

  translateLine(dialect: string, line: string): string {
    if (dialect === this.canonicalDialect) {
      return line;
    }
    return this.rewriteLine(dialect, this.profileFor(dialect).rules, line, 0);
  }

  translateResponse(dialect: string, reply: Reply): Reply {
    if (dialect === this.canonicalDialect) {
      return reply;
    }
    const { transformKey } = this.profileFor(dialect);
    return normalizeKeys(reply, transformKey, { onCollision: this.keyCollision });
  }

  translateResponses(dialect: string, replies: readonly Reply[]): Reply[] {
    return replies.map((reply) => this.translateResponse(dialect, reply));
  }

  /**
   * Returns a new Translator whose table for `dialect` is `before`, then the
   * existing rules, then `after`. Unknown dialects are registered fresh.
   */
  extend(dialect: string, extension: DialectExtension): Translator {
    const existing = Object.prototype.hasOwnProperty.call(this.options.dialects, dialect)
      ? this.options.dialects[dialect]
      : undefined;
    const rules = [...(extension.before ?? []), ...(existing?.rules ?? []), ...(extension.after ?? [])];
    const transformKey = extension.transformKey ?? existing?.transformKey;

    return new Translator({
      ...this.options,
      dialects: {
        ...this.options.dialects,
        [dialect]: transformKey ? { rules, transformKey } : { rules }
      }
    });
  }
}
