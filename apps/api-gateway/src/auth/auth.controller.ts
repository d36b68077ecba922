import {
  Controller,
  Post,
  Get,
  Patch,
  Body,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  RegisterDto,
  LoginDto,
  AuthResponseDto,
  UpdateOptionsDto,
  UserProfileDto,
} from './dto';
import { JwtAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * Routes:
 * - POST  /auth/register    create an account (public)
 * - POST  /auth/login       exchange credentials for a token (public)
 * - GET   /auth/me          current profile
 * - PATCH /auth/me/options  display preferences
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @throws 409 Conflict if the email is taken
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<AuthResponseDto> {
    return this.authService.register(dto);
  }

  /**
   * @throws 401 Unauthorized on bad credentials
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    return this.authService.login(dto);
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  async getProfile(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
    return this.authService.getProfile(user.userId);
  }

  @Patch('me/options')
  @UseGuards(JwtAuthGuard)
  async updateOptions(
    @CurrentUser() user: RequestUser,
    @Body() dto: UpdateOptionsDto,
  ): Promise<UserProfileDto> {
    return this.authService.updateOptions(user.userId, dto);
  }
}
