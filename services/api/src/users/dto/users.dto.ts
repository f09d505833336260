import { IsBoolean, IsEmail, IsIn, IsOptional, IsString, MaxLength, ValidateIf } from 'class-validator';
import { Transform } from 'class-transformer';
import { REMINDER } from '@courtside/shared';

/**
 * Reminder and contact settings update
 */
export class UpdateSettingsDto {
  /** Empty string clears the address */
  @IsOptional()
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @ValidateIf((dto: UpdateSettingsDto) => dto.email !== '')
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @IsOptional()
  @IsBoolean()
  unreadReminderEnabled?: boolean;

  @IsOptional()
  @IsIn(REMINDER.ALLOWED_DELAYS_MIN, { message: 'unreadReminderDelayMin must be one of 30, 60, 180' })
  unreadReminderDelayMin?: number;
}

/**
 * Optional new address for a verification request
 */
export class StartVerificationDto {
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsEmail()
  @MaxLength(255)
  email?: string;
}
