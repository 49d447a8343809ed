import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { Actor, isActor } from '../interfaces/actor.interface';

/**
 * CurrentActor decorator - extracts the Actor attached by JwtStrategy.
 * Only valid on routes behind JwtAuthGuard.
 */
export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const user: unknown = request.user;
    if (!isActor(user)) {
      throw new UnauthorizedException('Authentication required');
    }
    return { subjectId: user.subjectId, role: user.role };
  },
);
