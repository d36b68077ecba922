import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { DEFAULT_USER_OPTIONS, User } from '@hairline/database';
import {
  RegisterDto,
  LoginDto,
  AuthResponseDto,
  UpdateOptionsDto,
  UserProfileDto,
} from './dto';
import {
  EmailAlreadyExistsException,
  InvalidCredentialsException,
} from './exceptions';
import type { JwtPayload } from './interfaces';

const BCRYPT_SALT_ROUNDS = 12;

/** One week */
const DEFAULT_JWT_EXPIRATION_SECONDS = 604_800;

/**
 * AuthService: registration, login, and the caller's own account.
 *
 * New accounts start non-premium with FREE_ANALYSES_PER_USER free
 * analyses. Premium and admin flags are only ever set by operators.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly freeAnalysesPerUser: number;
  private readonly expiresIn: number;

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {
    this.freeAnalysesPerUser = Number(
      this.configService.get<number>('FREE_ANALYSES_PER_USER', 1),
    );
    this.expiresIn = Number(
      this.configService.get<number>(
        'JWT_EXPIRATION',
        DEFAULT_JWT_EXPIRATION_SECONDS,
      ),
    );
  }

  /**
   * @throws EmailAlreadyExistsException
   */
  async register(dto: RegisterDto): Promise<AuthResponseDto> {
    const email = dto.email.toLowerCase();

    const existingUser = await this.userRepository.findOne({
      where: { email },
      select: ['id'],
    });

    if (existingUser) {
      throw new EmailAlreadyExistsException(dto.email);
    }

    const passwordHash = await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);

    const savedUser = await this.userRepository.save(
      this.userRepository.create({
        email,
        passwordHash,
        fullName: dto.fullName.trim(),
        freeAnalysesRemaining: this.freeAnalysesPerUser,
        options: { ...DEFAULT_USER_OPTIONS },
      }),
    );

    this.logger.log(`User registered: ${savedUser.id} (${savedUser.email})`);

    return this.generateTokenResponse(savedUser);
  }

  /**
   * @throws InvalidCredentialsException
   */
  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.userRepository.findOne({
      where: { email: dto.email.toLowerCase() },
      select: ['id', 'email', 'passwordHash', 'isActive'],
    });

    if (!user) {
      // Same bcrypt cost as a real check so unknown emails are not faster
      await bcrypt.hash(dto.password, BCRYPT_SALT_ROUNDS);
      throw new InvalidCredentialsException();
    }

    if (!user.isActive) {
      throw new InvalidCredentialsException();
    }

    const isPasswordValid = await bcrypt.compare(
      dto.password,
      user.passwordHash,
    );

    if (!isPasswordValid) {
      throw new InvalidCredentialsException();
    }

    this.logger.log(`User logged in: ${user.id}`);

    return this.generateTokenResponse(user);
  }

  async getProfile(userId: string): Promise<UserProfileDto> {
    return UserProfileDto.fromEntity(await this.findUser(userId));
  }

  /** Merges display preferences into the stored options. */
  async updateOptions(
    userId: string,
    dto: UpdateOptionsDto,
  ): Promise<UserProfileDto> {
    const user = await this.findUser(userId);

    user.options = {
      ...DEFAULT_USER_OPTIONS,
      ...user.options,
      showOnLeaderboard: dto.showOnLeaderboard,
    };
    const saved = await this.userRepository.save(user);

    this.logger.log(
      `User ${userId} set showOnLeaderboard=${dto.showOnLeaderboard}`,
    );

    return UserProfileDto.fromEntity(saved);
  }

  // ── Private Helpers ───────────────────────────────────────

  private async findUser(userId: string): Promise<User> {
    const user = await this.userRepository.findOne({ where: { id: userId } });

    if (!user) {
      // Deleted between token validation and this lookup
      this.logger.error(`Profile requested for non-existent user: ${userId}`);
      throw new InvalidCredentialsException();
    }

    return user;
  }

  private generateTokenResponse(
    user: Pick<User, 'id' | 'email'>,
  ): AuthResponseDto {
    const payload: JwtPayload = {
      sub: user.id,
      email: user.email,
    };

    return new AuthResponseDto(this.jwtService.sign(payload), this.expiresIn);
  }
}
