// Detection of request/response envelope fields by naming convention

import { EnvelopeMatch, EnvelopeRole, EnvelopeRule, StructLike } from '../types';

export const DEFAULT_ENVELOPE_RULES: readonly EnvelopeRule[] = [
  { role: 'request', fieldName: 'base', typeName: 'base.Base' },
  { role: 'response', fieldName: 'baseResp', typeName: 'base.BaseResp' }
];

/**
 * Collects the records carrying an envelope field. A field matches a rule when its
 * unexported name and its type name both equal the rule's exactly. Records keep
 * declaration order and appear at most once per role.
 */
export function extractEnvelopes(
  structLikes: readonly StructLike[],
  unexport: (name: string) => string,
  rules: readonly EnvelopeRule[] = DEFAULT_ENVELOPE_RULES
): EnvelopeMatch {
  const matched: Record<EnvelopeRole, StructLike[]> = { request: [], response: [] };

  for (const structLike of structLikes) {
    const roles = new Set<EnvelopeRole>();
    for (const field of structLike.fields) {
      const fieldName = unexport(field.name);
      for (const rule of rules) {
        if (fieldName === rule.fieldName && field.type.name === rule.typeName) {
          roles.add(rule.role);
        }
      }
    }
    for (const role of roles) {
      matched[role].push(structLike);
    }
  }

  return { requests: matched.request, responses: matched.response };
}

// The field name carrying `role`'s envelope, for accessor generation
export function envelopeFieldName(role: EnvelopeRole, rules: readonly EnvelopeRule[] = DEFAULT_ENVELOPE_RULES): string {
  const rule = rules.find(candidate => candidate.role === role);
  if (!rule) {
    throw new Error(`No envelope rule defined for role '${role}'`);
  }
  return rule.fieldName;
}
