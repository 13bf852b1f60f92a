import { Controller, Get, Param, Post, Version } from '@nestjs/common';
import { UserProgressView } from '@skillcoach/shared-types';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /** Register a trainee; repeated calls return the existing record */
  @Post(':userId')
  @Version('1')
  async register(@Param('userId') userId: string): Promise<UserProgressView> {
    return this.usersService.register(userId);
  }

  @Get(':userId/progress')
  @Version('1')
  async getProgress(@Param('userId') userId: string): Promise<UserProgressView> {
    return this.usersService.getProgress(userId);
  }
}
