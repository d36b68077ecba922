import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard, PremiumGuard } from '../auth';
import type { RequestUser } from '../auth';
import { CounselingService } from './counseling.service';
import { SendMessageDto } from './dto/counseling.dto';
import type {
  MessageStatusDto,
  SentMessageDto,
  SessionDetailDto,
  SessionDto,
} from './dto/counseling.dto';

@Controller('api/counseling')
@UseGuards(JwtAuthGuard, PremiumGuard)
export class CounselingController {
  constructor(private readonly counselingService: CounselingService) {}

  @Get('sessions')
  list(@CurrentUser() user: RequestUser): Promise<SessionDto[]> {
    return this.counselingService.listSessions(user.userId);
  }

  @Post('sessions')
  create(@CurrentUser() user: RequestUser): Promise<SessionDto> {
    return this.counselingService.createSession(user.userId);
  }

  @Get('sessions/:id')
  get(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
  ): Promise<SessionDetailDto> {
    return this.counselingService.getSession(user.userId, id);
  }

  @Delete('sessions/:id')
  remove(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
  ): Promise<{ success: true }> {
    return this.counselingService.removeSession(user.userId, id);
  }

  @Post('sessions/:id/messages')
  send(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
    @Body() dto: SendMessageDto,
  ): Promise<SentMessageDto> {
    return this.counselingService.sendMessage(user.userId, id, dto);
  }

  @Get('messages/:id/status')
  status(
    @CurrentUser() user: RequestUser,
    @Param('id') id: string,
  ): Promise<MessageStatusDto> {
    return this.counselingService.getMessageStatus(user.userId, id);
  }
}
