/**
 * backend/src/modules/users/dal/user.statements.ts
 *
 * Statement catalog for the users DAL. Every store operation runs exactly one
 * of these; the name travels with logs and StoreError so a failure can be
 * traced to its statement without the SQL text.
 */

export const USER_STATEMENTS = [
  'ADD_USER',
  'GET_USER_BY_ID',
  'GET_USER_BY_EMAIL',
  'GET_USERS',
  'GET_SORTED',
  'GET_PARTICIPANTS',
  'GET_SPEAKERS',
  'GET_NUMBER_OF_RECORDS',
  'UPDATE_USER',
  'UPDATE_PASSWORD',
  'SET_ROLE',
  'DELETE_USER',
  'REGISTER_FOR_EVENT',
  'CANCEL_REGISTRATION',
  'IS_REGISTERED',
] as const;

export type UserStatement = (typeof USER_STATEMENTS)[number];
