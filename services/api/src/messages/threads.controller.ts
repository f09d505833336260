import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { MessageDto, ThreadDetailDto, ThreadSummaryDto } from '@courtside/shared';
import { MessagesService } from './messages.service';
import { SendMessageDto, StartDirectThreadDto, StartSubjectThreadDto } from './dto';
import { AuthenticatedRequest, JwtAuthGuard } from '../auth/jwt-auth.guard';

@Controller('threads')
@UseGuards(JwtAuthGuard)
export class ThreadsController {
  constructor(private readonly messagesService: MessagesService) {}

  /**
   * Threads of the current user, most recently active first.
   * GET /threads
   */
  @Get()
  async listThreads(@Request() req: AuthenticatedRequest): Promise<ThreadSummaryDto[]> {
    return this.messagesService.listThreads(req.user.id);
  }

  /**
   * GET /threads/unread-count
   */
  @Get('unread-count')
  async unreadCount(@Request() req: AuthenticatedRequest): Promise<{ unread: number }> {
    return this.messagesService.unreadCount(req.user.id);
  }

  /**
   * Start a direct thread by username. Returns the active thread if there is one.
   * POST /threads/direct
   */
  @Post('direct')
  async startDirect(
    @Request() req: AuthenticatedRequest,
    @Body() dto: StartDirectThreadDto
  ): Promise<ThreadDetailDto> {
    return this.messagesService.startDirectThread(req.user.id, dto.username);
  }

  /**
   * Start a thread with an item's owner about that item.
   * POST /threads/subject
   */
  @Post('subject')
  async startSubject(
    @Request() req: AuthenticatedRequest,
    @Body() dto: StartSubjectThreadDto
  ): Promise<ThreadDetailDto> {
    return this.messagesService.startSubjectThread(req.user.id, dto.subjectId, dto.ownerId);
  }

  /**
   * Thread detail. Viewing marks incoming messages read.
   * GET /threads/:id
   */
  @Get(':id')
  async getThread(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseUUIDPipe) threadId: string
  ): Promise<ThreadDetailDto> {
    return this.messagesService.openThread(threadId, req.user.id);
  }

  /**
   * POST /threads/:id/messages
   */
  @Post(':id/messages')
  async sendMessage(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseUUIDPipe) threadId: string,
    @Body() dto: SendMessageDto
  ): Promise<MessageDto> {
    return this.messagesService.sendMessage(threadId, req.user.id, dto.body);
  }

  /**
   * POST /threads/:id/read
   */
  @Post(':id/read')
  @HttpCode(HttpStatus.OK)
  async markRead(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseUUIDPipe) threadId: string
  ): Promise<{ marked: number }> {
    return this.messagesService.markRead(threadId, req.user.id);
  }

  /**
   * POST /threads/:id/archive
   */
  @Post(':id/archive')
  @HttpCode(HttpStatus.OK)
  async archive(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseUUIDPipe) threadId: string
  ): Promise<{ id: string; isActive: boolean }> {
    return this.messagesService.archiveThread(threadId, req.user.id);
  }
}
