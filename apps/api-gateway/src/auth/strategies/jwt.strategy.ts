import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@hairline/database';
import type { JwtPayload, RequestUser } from '../interfaces';

/**
 * Verifies Bearer tokens, then reloads the account so a deactivated or
 * deleted user is rejected and the premium/admin flags are current.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    configService: ConfigService,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {
    const secret = configService.get<string>('JWT_SECRET');

    if (!secret) {
      throw new Error('JWT_SECRET is not defined. Check your .env file.');
    }

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
    });
  }

  async validate(payload: JwtPayload): Promise<RequestUser> {
    const user = await this.userRepository.findOne({
      where: { id: payload.sub },
      select: ['id', 'email', 'isActive', 'isPremium', 'isAdmin'],
    });

    if (!user) {
      this.logger.warn(`JWT validation failed: user ${payload.sub} not found`);
      throw new UnauthorizedException('User no longer exists');
    }

    if (!user.isActive) {
      this.logger.warn(
        `JWT validation failed: user ${payload.sub} is deactivated`,
      );
      throw new UnauthorizedException('User account is deactivated');
    }

    return {
      userId: user.id,
      email: user.email,
      isPremium: user.isPremium,
      isAdmin: user.isAdmin,
    };
  }
}
