export { AuthGate } from './auth-gate.guard';
export { AuthRejectReason, AUTH_REJECT_MESSAGES } from './auth-reject-reason';
export { readBearerCredential, BEARER_PREFIX } from './bearer-credential';
