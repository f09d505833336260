import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { delay } from '@courtside/shared';
import { Notifier, OutboundMessage } from './notifier';

const BREVO_SEND_URL = 'https://api.brevo.com/v3/smtp/email';
const MAX_ATTEMPTS = 3;

interface BrevoSendResponse {
  messageId?: string;
}

/**
 * Transactional email through the Brevo HTTP API
 */
@Injectable()
export class BrevoEmailNotifier implements Notifier {
  private readonly logger = new Logger(BrevoEmailNotifier.name);

  private readonly apiKey: string | undefined;
  private readonly fromEmail: string | undefined;
  private readonly fromName: string;
  private readonly retryDelayMs: number;

  constructor(configService: ConfigService) {
    this.apiKey = configService.get<string>('BREVO_API_KEY');
    this.fromEmail = configService.get<string>('MAIL_FROM_EMAIL');
    this.fromName = configService.get<string>('MAIL_FROM_NAME') || 'Courtside';
    this.retryDelayMs = Number(configService.get<string>('MAIL_RETRY_DELAY_MS') ?? 1000);

    if (!this.isConfigured()) {
      this.logger.warn('Email not configured - BREVO_API_KEY and MAIL_FROM_EMAIL are required');
    }
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey && this.fromEmail);
  }

  async send(message: OutboundMessage): Promise<void> {
    if (!this.apiKey || !this.fromEmail) {
      throw new Error('Email is not configured');
    }

    const payload = {
      sender: { name: this.fromName, email: this.fromEmail },
      to: [{ email: message.to }],
      subject: message.subject,
      textContent: message.text,
      ...(message.html ? { htmlContent: message.html } : {}),
    };

    let lastError = 'unknown error';
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await fetch(BREVO_SEND_URL, {
          method: 'POST',
          headers: {
            accept: 'application/json',
            'api-key': this.apiKey,
            'content-type': 'application/json',
          },
          body: JSON.stringify(payload),
        });

        if (response.ok) {
          const result = (await response.json()) as BrevoSendResponse;
          this.logger.log(`Email sent to ${message.to} (ID: ${result.messageId ?? 'unknown'})`);
          return;
        }
        lastError = `HTTP ${response.status}: ${await response.text()}`;
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
      }

      this.logger.warn(`Email attempt ${attempt}/${MAX_ATTEMPTS} failed: ${lastError}`);
      if (attempt < MAX_ATTEMPTS) {
        await delay(this.retryDelayMs);
      }
    }

    throw new Error(`Failed to send email after ${MAX_ATTEMPTS} attempts: ${lastError}`);
  }
}
