import { Controller, Get } from '@nestjs/common';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * Who is logged in right now.
   * GET /users/online
   */
  @Get('online')
  getOnline(): { users: string[] } {
    return { users: this.usersService.getOnlineUsers() };
  }
}
