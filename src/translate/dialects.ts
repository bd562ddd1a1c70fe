import { UNTRANSLATABLE, type RuleSpec } from './patternMatcher.js';
import { DEFAULT_CANONICAL_DIALECT, Translator, type TranslatorOptions } from './translator.js';

export const EOS_DIALECT = DEFAULT_CANONICAL_DIALECT;
export const MOS_DIALECT = 'mos';

// Order matters: the ap1/ forms must be tried before the broader interface rules.
export const MOS_RULES: readonly RuleSpec[] = [
  ['interface ap1/(.*)', 'interface ap\\1'],
  ['l1 source interface ap1/(.*)', 'source ap\\1'],
  ['l1 source interface ap(.*)', UNTRANSLATABLE],
  ['l1 source interface (.*)', 'source \\1'],
  ['l1 source mac', 'source mac'],
  ['no l1 source', 'no source'],
  ['bash sudo cortina', UNTRANSLATABLE],
  ['traffic-loopback source network device phy', 'loopback internal'],
  ['traffic-loopback source system device phy', 'loopback'],
  ['no traffic-loopback', 'no loopback']
];

export function createDefaultTranslator(
  options: Omit<TranslatorOptions, 'dialects' | 'canonicalDialect'> = {}
): Translator {
  return new Translator({
    ...options,
    canonicalDialect: EOS_DIALECT,
    dialects: {
      [MOS_DIALECT]: { rules: MOS_RULES }
    }
  });
}
