import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThreadEntity } from './thread.entity';
import { MessageEntity } from './message.entity';
import { ConversationsService } from './conversations.service';
import { MessagesService } from './messages.service';
import { ThreadsController } from './threads.controller';
import { UsersModule } from '../users/users.module';
import { AuthModule } from '../auth/auth.module';

@Module({
  imports: [TypeOrmModule.forFeature([ThreadEntity, MessageEntity]), UsersModule, AuthModule],
  controllers: [ThreadsController],
  providers: [ConversationsService, MessagesService],
  exports: [ConversationsService, MessagesService],
})
export class MessagesModule {}
