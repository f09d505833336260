import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EMAIL_VERIFY_TOKEN_TYPE, EmailVerificationService } from '../email-verification.service';
import { UsersService } from '../users.service';
import { UserEntity } from '../user.entity';
import { NOTIFIER, OutboundMessage } from '../../notifications/notifier';
import { inMemoryDatabase } from '../../testing/database';

class FakeNotifier {
  configured = true;
  fail = false;
  readonly sent: OutboundMessage[] = [];

  isConfigured(): boolean {
    return this.configured;
  }

  async send(message: OutboundMessage): Promise<void> {
    if (this.fail) {
      throw new Error('mailbox unavailable');
    }
    this.sent.push(message);
  }
}

describe('EmailVerificationService', () => {
  let module: TestingModule;
  let service: EmailVerificationService;
  let jwtService: JwtService;
  let repository: Repository<UserEntity>;
  let notifier: FakeNotifier;
  let user: UserEntity;

  function sentToken(): string {
    const match = /token=(\S+)/.exec(notifier.sent[notifier.sent.length - 1].text);
    if (!match) {
      throw new Error('No verification link in the last email');
    }
    return decodeURIComponent(match[1]);
  }

  beforeEach(async () => {
    notifier = new FakeNotifier();
    module = await Test.createTestingModule({
      imports: [
        inMemoryDatabase(),
        TypeOrmModule.forFeature([UserEntity]),
        JwtModule.register({ secret: 'test-secret' }),
      ],
      providers: [
        UsersService,
        EmailVerificationService,
        { provide: ConfigService, useValue: new ConfigService({ WEB_APP_URL: 'https://app.example.com' }) },
        { provide: NOTIFIER, useValue: notifier },
      ],
    }).compile();

    service = module.get(EmailVerificationService);
    jwtService = module.get(JwtService);
    repository = module.get(getRepositoryToken(UserEntity));
    user = await repository.save(
      repository.create({ username: 'coach', displayName: 'Coach', email: 'coach@example.com' }),
    );
  });

  afterEach(async () => {
    await module.close();
  });

  describe('start', () => {
    it('should refuse when email is not configured', async () => {
      notifier.configured = false;

      await expect(service.start(user.id)).rejects.toThrow(ServiceUnavailableException);
      expect(notifier.sent).toHaveLength(0);
    });

    it('should require an address on file', async () => {
      await repository.update(user.id, { email: null });

      await expect(service.start(user.id)).rejects.toThrow('No email address on file');
    });

    it('should mail a verification link to the stored address', async () => {
      await expect(service.start(user.id)).resolves.toEqual({ sent: true });

      expect(notifier.sent).toHaveLength(1);
      expect(notifier.sent[0].to).toBe('coach@example.com');
      expect(notifier.sent[0].subject).toBe('Verify your Courtside email');
      expect(notifier.sent[0].text).toContain('Verify link: https://app.example.com/verify-email?token=');

      const claims = await jwtService.verifyAsync<{ sub: string; email: string; type: string }>(sentToken());
      expect(claims.sub).toBe(user.id);
      expect(claims.email).toBe('coach@example.com');
      expect(claims.type).toBe(EMAIL_VERIFY_TOKEN_TYPE);
    });

    it('should replace the address before sending when one is given', async () => {
      await service.start(user.id, '  Scout@Example.com ');

      expect(notifier.sent[0].to).toBe('scout@example.com');
      const stored = await repository.findOneByOrFail({ id: user.id });
      expect(stored.email).toBe('scout@example.com');
      expect(stored.emailVerified).toBe(false);
    });

    it('should report a failed send', async () => {
      notifier.fail = true;

      await expect(service.start(user.id)).rejects.toThrow('Failed to send verification email');
    });
  });

  describe('verify', () => {
    it('should mark the address verified with the mailed token', async () => {
      await service.start(user.id);

      await expect(service.verify(sentToken())).resolves.toEqual({ verified: true });
      const stored = await repository.findOneByOrFail({ id: user.id });
      expect(stored.emailVerified).toBe(true);
    });

    it('should reject a session token', async () => {
      const token = jwtService.sign({ sub: user.id, username: 'coach' });

      await expect(service.verify(token)).rejects.toThrow('Invalid verification token');
    });

    it('should reject a token of another type', async () => {
      const token = jwtService.sign({ sub: user.id, email: 'coach@example.com', type: 'password_reset' });

      await expect(service.verify(token)).rejects.toThrow('Invalid verification token');
    });

    it('should reject an expired token', async () => {
      const token = jwtService.sign({
        sub: user.id,
        email: 'coach@example.com',
        type: EMAIL_VERIFY_TOKEN_TYPE,
        exp: Math.floor(Date.now() / 1000) - 60,
      });

      await expect(service.verify(token)).rejects.toThrow('Invalid or expired verification token');
    });

    it('should reject a malformed or foreign token', async () => {
      const foreign = new JwtService({ secret: 'other-secret' }).sign({
        sub: user.id,
        email: 'coach@example.com',
        type: EMAIL_VERIFY_TOKEN_TYPE,
      });

      await expect(service.verify('not-a-token')).rejects.toThrow(BadRequestException);
      await expect(service.verify(foreign)).rejects.toThrow('Invalid or expired verification token');
    });

    it('should reject a link for an address that has since changed', async () => {
      await service.start(user.id);
      const staleToken = sentToken();
      await service.start(user.id, 'scout@example.com');

      await expect(service.verify(staleToken)).rejects.toThrow('Email does not match current user email');
      const stored = await repository.findOneByOrFail({ id: user.id });
      expect(stored.emailVerified).toBe(false);

      await service.verify(sentToken());
      expect((await repository.findOneByOrFail({ id: user.id })).emailVerified).toBe(true);
    });
  });
});
