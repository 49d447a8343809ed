/**
 * The caller of an operation, decoded from the identity provider's token.
 * Passed explicitly into every incidencia operation.
 */
export interface Actor {
  subjectId: string;
  role: string;
}

export function isActor(value: unknown): value is Actor {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    'subjectId' in value &&
    typeof value.subjectId === 'string' &&
    value.subjectId.length > 0 &&
    'role' in value &&
    typeof value.role === 'string' &&
    value.role.length > 0
  );
}
