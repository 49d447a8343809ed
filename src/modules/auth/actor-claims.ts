import { Actor } from './interfaces/actor.interface';

/**
 * Claim names accepted for the subject identifier, in order of precedence.
 * The identity service has issued tokens under each of these over time.
 */
export const SUBJECT_CLAIMS = ['sub', 'user_id', 'usuario_id', 'id'] as const;

/** Claim names accepted for the role, in order of precedence. */
export const ROLE_CLAIMS = ['role', 'rol', 'tipo_usuario'] as const;

function firstNonEmpty(
  claims: Record<string, unknown>,
  names: readonly string[],
): string | undefined {
  for (const name of names) {
    const value = claims[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Build an Actor from a decoded claim set.
 * Returns null when either the subject or the role is missing.
 */
export function actorFromClaims(claims: Record<string, unknown>): Actor | null {
  const subjectId = firstNonEmpty(claims, SUBJECT_CLAIMS);
  const role = firstNonEmpty(claims, ROLE_CLAIMS);

  if (!subjectId || !role) {
    return null;
  }

  return { subjectId, role };
}
