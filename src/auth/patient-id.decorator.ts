import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedPatient } from './jwt.strategy';

export function isAuthenticatedPatient(user: unknown): user is AuthenticatedPatient {
  return typeof user === 'object' && user !== null && 'patientId' in user && typeof user.patientId === 'number';
}

export function extractPatientId(user: unknown): number {
  if (!isAuthenticatedPatient(user)) {
    throw new UnauthorizedException();
  }
  return user.patientId;
}

/** Id of the patient the JWT guard authenticated. */
export const PatientId = createParamDecorator((_data: unknown, ctx: ExecutionContext): number => {
  const request = ctx.switchToHttp().getRequest<{ user?: unknown }>();
  return extractPatientId(request.user);
});
