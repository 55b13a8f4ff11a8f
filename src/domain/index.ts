/**
 * Pure tournament domain: qualification, playoff brackets and seeding.
 * Nothing here touches the database, HTTP or logging.
 */
export * from './tournament';
