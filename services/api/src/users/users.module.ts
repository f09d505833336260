import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserEntity } from './user.entity';
import { UsersService } from './users.service';
import { UsersController } from './users.controller';
import { EmailVerificationService } from './email-verification.service';
import { AuthModule } from '../auth/auth.module';
import { NotificationsModule } from '../notifications/notifications.module';

@Module({
  imports: [TypeOrmModule.forFeature([UserEntity]), AuthModule, NotificationsModule],
  controllers: [UsersController],
  providers: [UsersService, EmailVerificationService],
  exports: [UsersService],
})
export class UsersModule {}
