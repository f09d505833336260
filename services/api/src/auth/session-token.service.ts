import { Injectable, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

/** Identity carried by a verified session token */
export interface SessionUser {
  id: string;
  username: string;
}

interface SessionClaims {
  sub?: unknown;
  username?: unknown;
  type?: unknown;
}

/**
 * Verifies session tokens issued by the auth system.
 * Tokens are never issued here.
 */
@Injectable()
export class SessionTokenService {
  constructor(private readonly jwtService: JwtService) {}

  async verify(token: string): Promise<SessionUser> {
    let claims: SessionClaims;
    try {
      claims = await this.jwtService.verifyAsync<SessionClaims>(token);
    } catch {
      throw new UnauthorizedException('Invalid token');
    }

    // Purpose-bound tokens (e.g. email verification) never open a session
    if (claims.type !== undefined) {
      throw new UnauthorizedException('Invalid token');
    }
    if (typeof claims.sub !== 'string' || typeof claims.username !== 'string') {
      throw new UnauthorizedException('Invalid token');
    }
    return { id: claims.sub, username: claims.username };
  }

  /**
   * Pulls the token out of an `Authorization: Bearer <token>` header
   */
  static fromAuthorizationHeader(header: string | undefined): string | undefined {
    if (!header) {
      return undefined;
    }
    const [scheme, token] = header.split(' ');
    return scheme === 'Bearer' && token ? token : undefined;
  }
}
