import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import {
  AuthenticatedRequest,
  AuthUser,
  MaybeAuthenticatedRequest,
} from '../interfaces/authenticated-request.interface';

/** The user the JWT strategy attached to the request. */
export const CurrentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthUser =>
    context.switchToHttp().getRequest<AuthenticatedRequest>().user,
);

/** Like `CurrentUser`, for routes behind `OptionalJwtAuthGuard`. */
export const OptionalUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthUser | undefined =>
    context.switchToHttp().getRequest<MaybeAuthenticatedRequest>().user,
);
