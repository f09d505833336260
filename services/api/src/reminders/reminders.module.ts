import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { MessagesModule } from '../messages/messages.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { ReminderAggregator } from './reminder-aggregator.service';
import { ReminderScheduler } from './reminder-scheduler.service';

@Module({
  imports: [UsersModule, MessagesModule, NotificationsModule],
  providers: [ReminderAggregator, ReminderScheduler],
  exports: [ReminderAggregator, ReminderScheduler],
})
export class RemindersModule {}
