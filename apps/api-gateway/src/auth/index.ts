// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Guards ──────────────────────────────────────────────────
export { JwtAuthGuard, PremiumGuard } from './guards';

// ── Decorators ──────────────────────────────────────────────
export { CurrentUser } from './decorators';

// ── Interfaces ──────────────────────────────────────────────
export type {
  JwtPayload,
  RequestUser,
  AuthenticatedRequest,
} from './interfaces';
