import { Body, Controller, Get, Patch, Post, Query, Request, UseGuards } from '@nestjs/common';
import { UserSettingsDto } from '@courtside/shared';
import { UsersService } from './users.service';
import { EmailVerificationService } from './email-verification.service';
import { StartVerificationDto, UpdateSettingsDto } from './dto';
import { AuthenticatedRequest, JwtAuthGuard } from '../auth/jwt-auth.guard';

@Controller('users')
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    private readonly emailVerification: EmailVerificationService
  ) {}

  /**
   * Get current user's profile and reminder settings.
   * GET /users/me
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  async getCurrentUser(@Request() req: AuthenticatedRequest): Promise<UserSettingsDto> {
    const user = await this.usersService.findByIdOrFail(req.user.id);
    return this.usersService.toSettingsDto(user);
  }

  /**
   * Update contact and reminder settings.
   * PATCH /users/me/settings
   */
  @Patch('me/settings')
  @UseGuards(JwtAuthGuard)
  async updateSettings(
    @Request() req: AuthenticatedRequest,
    @Body() dto: UpdateSettingsDto
  ): Promise<UserSettingsDto> {
    const user = await this.usersService.updateSettings(req.user.id, dto);
    return this.usersService.toSettingsDto(user);
  }

  /**
   * Send a verification link to the user's email.
   * POST /users/me/email/verification
   */
  @Post('me/email/verification')
  @UseGuards(JwtAuthGuard)
  async startVerification(@Request() req: AuthenticatedRequest, @Body() dto: StartVerificationDto) {
    return this.emailVerification.start(req.user.id, dto.email);
  }

  /**
   * Redeem a verification link. Unauthenticated: the token identifies the user.
   * GET /users/email/verify?token=
   */
  @Get('email/verify')
  async verifyEmail(@Query('token') token?: string) {
    return this.emailVerification.verify(token ?? '');
  }
}
