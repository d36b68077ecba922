export { EmailAlreadyExistsException } from './email-already-exists.exception';
export { InvalidCredentialsException } from './invalid-credentials.exception';
export { PremiumRequiredException } from './premium-required.exception';
