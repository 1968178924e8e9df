export { bindIdentity, getUserId, NO_USER_ID } from './request-identity';
