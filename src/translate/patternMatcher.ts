import { DutError, ensureError } from '../errors.js';

/** Replacement marking a command the target dialect has no equivalent for. */
export const UNTRANSLATABLE = Symbol('untranslatable');

export type Replacement = string | typeof UNTRANSLATABLE;

export type RuleSpec = readonly [pattern: string | RegExp, replacement: Replacement];

export interface CompiledRule {
  index: number;
  source: string;
  matcher: RegExp;
  replacement: Replacement;
}

export type RuleOutcome =
  | { kind: 'unchanged'; line: string }
  | { kind: 'rewritten'; line: string; rule: CompiledRule }
  | { kind: 'untranslatable'; line: string; rule: CompiledRule };

// \\ literal backslash, \N or $N numbered group, $<name> named group, $$ literal dollar.
const TEMPLATE_TOKEN = /\\\\|\\(\d+)|\$(\d+)|\$<([^>]+)>|\$\$/g;

function invalidPattern(index: number, source: string, reason: string, cause?: unknown): DutError {
  return new DutError('INVALID_PATTERN', `Rule ${index} /${source}/: ${reason}`, {
    cause,
    details: { index, pattern: source }
  });
}

function validateTemplate(
  template: string,
  groupCount: number,
  groupNames: ReadonlySet<string>,
  index: number,
  source: string
): void {
  for (const token of template.matchAll(TEMPLATE_TOKEN)) {
    const numbered = token[1] ?? token[2];
    if (numbered !== undefined && Number(numbered) > groupCount) {
      throw invalidPattern(
        index,
        source,
        `replacement "${template}" references group ${numbered} but the pattern defines ${groupCount}`
      );
    }
    const name = token[3];
    if (name !== undefined && !groupNames.has(name)) {
      throw invalidPattern(index, source, `replacement "${template}" references unknown group "${name}"`);
    }
  }
}

function compileRule(spec: RuleSpec, index: number): CompiledRule {
  const [pattern, replacement] = spec;
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags;

  if (flags.includes('g') || flags.includes('y')) {
    throw invalidPattern(index, source, 'patterns must not carry the g or y flag');
  }

  let matcher: RegExp;
  let emptyMatch: RegExpExecArray | null;
  try {
    matcher = new RegExp(`^(?:${source})`, flags);
    // The empty alternative always matches, exposing the pattern's group layout.
    emptyMatch = new RegExp(`(?:${source})|`, flags).exec('');
  } catch (error) {
    throw invalidPattern(index, source, ensureError(error).message, error);
  }

  if (typeof replacement === 'string') {
    const groupCount = emptyMatch ? emptyMatch.length - 1 : 0;
    const groupNames = new Set(Object.keys(emptyMatch?.groups ?? {}));
    validateTemplate(replacement, groupCount, groupNames, index, source);
  }

  return { index, source, matcher, replacement };
}

/**
 * Compiles a rule table. Every pattern is anchored at the start of the line and
 * left open at the end, so `interface ap1/(.*)` matches `interface ap1/3` but not
 * `no interface ap1/3`. Bad patterns fail here rather than at first use.
 */
export function compileRules(rules: readonly RuleSpec[]): CompiledRule[] {
  return rules.map((rule, index) => compileRule(rule, index));
}

export function expandTemplate(template: string, match: RegExpExecArray): string {
  return template.replace(
    TEMPLATE_TOKEN,
    (token: string, backslashGroup?: string, dollarGroup?: string, name?: string) => {
      if (token === '\\\\') {
        return '\\';
      }
      if (token === '$$') {
        return '$';
      }
      if (name !== undefined) {
        return match.groups?.[name] ?? '';
      }
      const group = backslashGroup ?? dollarGroup;
      return group === undefined ? '' : match[Number(group)] ?? '';
    }
  );
}

/** First matching rule wins; the whole line is replaced by its expanded template. */
export function applyRules(line: string, rules: readonly CompiledRule[]): RuleOutcome {
  for (const rule of rules) {
    const match = rule.matcher.exec(line);
    if (!match) {
      continue;
    }
    if (rule.replacement === UNTRANSLATABLE) {
      return { kind: 'untranslatable', line, rule };
    }
    return { kind: 'rewritten', line: expandTemplate(rule.replacement, match), rule };
  }
  return { kind: 'unchanged', line };
}
