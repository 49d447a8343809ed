import { Injectable } from '@nestjs/common';
import { Actor } from '../../auth/interfaces/actor.interface';

/** Role names (compared case-insensitively) that grant administrator rights */
export const ADMINISTRATOR_ROLES = ['administrador', 'admin'];

/** The part of an incidencia the policy needs to decide ownership */
export interface OwnedResource {
  reporterId: string;
}

export type UpdatableField =
  | 'title'
  | 'description'
  | 'categoryCode'
  | 'priorityCode'
  | 'locationId';

/** Fields a reporter may edit on their own ticket */
const REPORTER_EDITABLE_FIELDS: readonly UpdatableField[] = [
  'title',
  'description',
  'categoryCode',
];

/**
 * Restriction applied to every listing. An empty object means unrestricted.
 */
export interface VisibilityFilter {
  reporterId?: string;
}

/**
 * IncidenciaAccessPolicy
 *
 * Every authorization decision for incidencias goes through here; callers never
 * compare roles themselves. All methods are pure.
 *
 * - Administrators see and change everything.
 * - Any other role sees, comments on and attaches files to its own tickets,
 *   and may edit title, description and category of them.
 * - State changes, assignment and deletion are administrator-only; owning the
 *   ticket does not help.
 */
@Injectable()
export class IncidenciaAccessPolicy {
  isAdministrator(actor: Actor): boolean {
    return ADMINISTRATOR_ROLES.includes(actor.role.toLowerCase());
  }

  isReporter(actor: Actor, incidencia: OwnedResource): boolean {
    return incidencia.reporterId === actor.subjectId;
  }

  canView(actor: Actor, incidencia: OwnedResource): boolean {
    return this.isAdministrator(actor) || this.isReporter(actor, incidencia);
  }

  canModifyState(actor: Actor): boolean {
    return this.isAdministrator(actor);
  }

  canAssignResponsible(actor: Actor): boolean {
    return this.isAdministrator(actor);
  }

  canDelete(actor: Actor): boolean {
    return this.isAdministrator(actor);
  }

  canComment(actor: Actor, incidencia: OwnedResource): boolean {
    return this.isAdministrator(actor) || this.isReporter(actor, incidencia);
  }

  canAttach(actor: Actor, incidencia: OwnedResource): boolean {
    return this.canComment(actor, incidencia);
  }

  canViewInternalComments(actor: Actor): boolean {
    return this.isAdministrator(actor);
  }

  /**
   * Fields from `fields` the actor may not change on this incidencia.
   * Assumes the actor can already view it.
   */
  forbiddenUpdateFields(
    actor: Actor,
    incidencia: OwnedResource,
    fields: readonly UpdatableField[],
  ): UpdatableField[] {
    if (this.isAdministrator(actor)) {
      return [];
    }
    if (!this.isReporter(actor, incidencia)) {
      return [...fields];
    }
    return fields.filter((field) => !REPORTER_EDITABLE_FIELDS.includes(field));
  }

  canUpdateFields(
    actor: Actor,
    incidencia: OwnedResource,
    fields: readonly UpdatableField[],
  ): boolean {
    return this.forbiddenUpdateFields(actor, incidencia, fields).length === 0;
  }

  /**
   * Listing restriction for the actor. For non-administrators the reporter
   * constraint is not negotiable: callers merge it last so it overrides any
   * client-supplied reporter filter.
   */
  visibilityFilter(actor: Actor): VisibilityFilter {
    if (this.isAdministrator(actor)) {
      return {};
    }
    return { reporterId: actor.subjectId };
  }
}
