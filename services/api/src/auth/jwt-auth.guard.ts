import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { SessionTokenService, SessionUser } from './session-token.service';

export interface AuthenticatedRequest extends Request {
  user: SessionUser;
}

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly sessionTokens: SessionTokenService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request & { user?: SessionUser }>();
    const token = SessionTokenService.fromAuthorizationHeader(request.headers.authorization);
    if (!token) {
      throw new UnauthorizedException('No token provided');
    }
    request.user = await this.sessionTokens.verify(token);
    return true;
  }
}
