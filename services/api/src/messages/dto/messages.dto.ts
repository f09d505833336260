import { IsString, Matches, IsUUID } from 'class-validator';
import { VALIDATION } from '@courtside/shared';

/**
 * Open the active direct thread with a user, starting a new one if none is active
 */
export class StartDirectThreadDto {
  @IsString()
  @Matches(VALIDATION.USERNAME, { message: 'username must be 3-32 letters, digits or underscores' })
  username!: string;
}

/**
 * Open the active thread with an item's owner about that item, starting one if needed
 */
export class StartSubjectThreadDto {
  @IsString()
  @Matches(VALIDATION.SUBJECT_ID, { message: 'subjectId must be 1-64 letters, digits, dashes or underscores' })
  subjectId!: string;

  @IsUUID()
  ownerId!: string;
}

/**
 * Message body. Trimmed and length-checked again by the store.
 */
export class SendMessageDto {
  @IsString()
  body!: string;
}
