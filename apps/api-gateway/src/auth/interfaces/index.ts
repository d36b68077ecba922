export type { JwtPayload } from './jwt-payload.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
