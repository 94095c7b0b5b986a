// =============================================================================
// WARDEN — Permission Set Checks
//
// Shared by user documents (Ubac) and roles (Rbac): every entry must parse,
// and no pattern may sit in both the allow and the deny set.
// =============================================================================

import { AccessPattern, findConflicts, formatPattern, parsePatternList } from '../../authorization/patterns';
import { FieldError } from '../../errors';
import { DocumentValue } from '../../types/documents';

function readPatternTexts(
  value: DocumentValue | undefined,
  field: string,
  errors: FieldError[],
): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    errors.push({ field, reason: 'type', message: `${field} must be a list of strings` });
    return [];
  }
  return value;
}

export function conflictMessage(pattern: AccessPattern): string {
  return `Permitted and forbidden sets are conflicted. The same permission is there in the both set. ('${formatPattern(pattern)}')`;
}

export function validatePermissionSets<P extends AccessPattern>(
  permissions: DocumentValue | undefined,
  forbidden: DocumentValue | undefined,
  parse: (text: string) => P,
): FieldError[] {
  const errors: FieldError[] = [];

  const sets = [
    { field: 'permissions', texts: readPatternTexts(permissions, 'permissions', errors) },
    { field: 'forbidden', texts: readPatternTexts(forbidden, 'forbidden', errors) },
  ];

  const [allow, deny] = sets.map(({ field, texts }) => {
    const { patterns, malformed } = parsePatternList(texts, parse);
    for (const { index, error } of malformed) {
      errors.push({ field: `${field}.${index}`, reason: 'malformed', message: error.message, value: texts[index] });
    }
    return patterns;
  });

  for (const conflict of findConflicts(allow, deny)) {
    errors.push({
      field: 'permissions',
      reason: 'conflict',
      message: conflictMessage(conflict),
      value: formatPattern(conflict),
    });
  }

  return errors;
}
