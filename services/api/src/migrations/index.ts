/**
 * Database Migrations Index
 *
 * Export all migrations in order for TypeORM CLI.
 */

export { CreateUsersAndThreads1760000000000 } from './1760000000000-CreateUsersAndThreads';
export { AddUnreadReminderSettings1760100000000 } from './1760100000000-AddUnreadReminderSettings';
