import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { actorFromClaims } from '../actor-claims';
import { Actor } from '../interfaces/actor.interface';

/**
 * Verifies bearer tokens issued by the platform's identity service and turns
 * the claim set into an Actor (attached to request.user).
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
      algorithms: [configService.get<string>('JWT_ALGORITHM') || 'HS256'],
    });
  }

  validate(payload: Record<string, unknown>): Actor {
    const actor = actorFromClaims(payload);

    if (!actor) {
      this.logger.warn('Rejected token without a usable subject or role claim');
      throw new UnauthorizedException('Token lacks subject or role claim');
    }

    return actor;
  }
}
