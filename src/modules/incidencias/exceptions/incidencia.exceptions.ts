import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

/**
 * Domain exceptions for the incidencias service.
 * The global HttpExceptionFilter derives the error `kind` from the HTTP
 * status, so each class maps to exactly one kind.
 */

export class AccessDeniedException extends ForbiddenException {
  constructor(reason: string) {
    super(reason);
  }
}

/**
 * Also raised for incidencias that exist but are not visible to the actor,
 * so the response never reveals that a ticket id is in use.
 */
export class IncidenciaNotFoundException extends NotFoundException {
  constructor(incidenciaId: number) {
    super(`Incidencia ${incidenciaId} not found`);
  }
}

export class InvalidInputException extends BadRequestException {}

export class InvalidTransitionException extends UnprocessableEntityException {
  constructor(from: string, to: string) {
    super(`Transition from "${from}" to "${to}" is not allowed`);
  }
}

export class ConcurrentModificationException extends ConflictException {
  constructor(incidenciaId: number) {
    super(
      `Incidencia ${incidenciaId} was modified by another request; reload and retry`,
    );
  }
}
