import { ForbiddenException, Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AppConfiguration } from '../config/configuration';

export const PATIENT_ROLE = 'PATIENT';

// Tokens are issued by the user service
export interface JwtPayload {
  sub: number | string;
  role: string;
}

export interface AuthenticatedPatient {
  patientId: number;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService<AppConfiguration, true>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get('jwtSecret', { infer: true }),
    });
  }

  validate(payload: JwtPayload): AuthenticatedPatient {
    const patientId = Number(payload.sub);
    if (!Number.isInteger(patientId) || patientId <= 0) {
      throw new UnauthorizedException('Invalid token subject');
    }

    if (payload.role !== PATIENT_ROLE) {
      throw new ForbiddenException('Only patients can access this resource');
    }

    return { patientId };
  }
}
