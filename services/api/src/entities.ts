import { UserEntity } from './users/user.entity';
import { ThreadEntity } from './messages/thread.entity';
import { MessageEntity } from './messages/message.entity';

export const ENTITIES = [UserEntity, ThreadEntity, MessageEntity];
