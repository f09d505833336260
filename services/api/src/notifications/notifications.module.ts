import { Module } from '@nestjs/common';
import { BrevoEmailNotifier } from './brevo-email.notifier';
import { NOTIFIER } from './notifier';

@Module({
  providers: [{ provide: NOTIFIER, useClass: BrevoEmailNotifier }],
  exports: [NOTIFIER],
})
export class NotificationsModule {}
