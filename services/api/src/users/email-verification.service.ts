import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { NOTIFIER, Notifier, OutboundMessage } from '../notifications/notifier';
import { UsersService } from './users.service';

export const EMAIL_VERIFY_TOKEN_TYPE = 'email_verify';
const EMAIL_VERIFY_TOKEN_TTL = '24h';

interface EmailVerifyClaims {
  sub?: unknown;
  email?: unknown;
  type?: unknown;
}

/**
 * Issues and redeems email verification links.
 * A verified address is required before unread reminders are sent.
 */
@Injectable()
export class EmailVerificationService {
  private readonly logger = new Logger(EmailVerificationService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
    @Inject(NOTIFIER) private readonly notifier: Notifier
  ) {}

  /**
   * Mails a verification link to the user's address, replacing it first when
   * `email` is given.
   */
  async start(userId: string, email?: string): Promise<{ sent: true }> {
    if (!this.notifier.isConfigured()) {
      throw new ServiceUnavailableException('Email is not configured');
    }

    const user =
      email !== undefined
        ? await this.usersService.updateSettings(userId, { email })
        : await this.usersService.findByIdOrFail(userId);
    if (!user.email) {
      throw new BadRequestException('No email address on file');
    }

    const token = await this.jwtService.signAsync(
      { sub: user.id, email: user.email, type: EMAIL_VERIFY_TOKEN_TYPE },
      { expiresIn: EMAIL_VERIFY_TOKEN_TTL }
    );
    const webAppUrl = this.configService.get<string>('WEB_APP_URL', 'http://localhost:4200');
    const verifyUrl = `${webAppUrl}/verify-email?token=${encodeURIComponent(token)}`;

    try {
      await this.notifier.send(buildVerificationEmail(user.email, verifyUrl));
    } catch (error) {
      this.logger.error(`Failed to send verification email to user ${user.id}`, error);
      throw new InternalServerErrorException('Failed to send verification email');
    }
    return { sent: true };
  }

  async verify(token: string): Promise<{ verified: true }> {
    let claims: EmailVerifyClaims;
    try {
      claims = await this.jwtService.verifyAsync<EmailVerifyClaims>(token);
    } catch {
      throw new BadRequestException('Invalid or expired verification token');
    }

    if (
      claims.type !== EMAIL_VERIFY_TOKEN_TYPE ||
      typeof claims.sub !== 'string' ||
      typeof claims.email !== 'string'
    ) {
      throw new BadRequestException('Invalid verification token');
    }

    await this.usersService.markEmailVerified(claims.sub, claims.email);
    return { verified: true };
  }
}

function buildVerificationEmail(to: string, verifyUrl: string): OutboundMessage {
  return {
    to,
    subject: 'Verify your Courtside email',
    text:
      'Please verify your email to enable unread message reminders.\n' +
      `Verify link: ${verifyUrl}\n\n` +
      'If you did not request this, you can ignore this email.',
    html:
      '<h2>Verify your email</h2>' +
      '<p>Please verify your email to enable unread message reminders.</p>' +
      `<p><a href="${verifyUrl}">Verify email</a></p>` +
      '<p>If you did not request this, you can ignore this email.</p>',
  };
}
