export { JwtAuthGuard } from './jwt-auth.guard';
export { PremiumGuard } from './premium.guard';
