export { AuthRejectedException } from './auth-rejected.exception';
export { EmailAlreadyExistsException } from './email-already-exists.exception';
export { InvalidCredentialsException } from './invalid-credentials.exception';
export { NotAuthenticatedException } from './not-authenticated.exception';
