import { Controller, Delete, HttpCode, HttpStatus, Param, Version } from '@nestjs/common';
import { Ack } from '@skillcoach/shared-types';
import { ErasureService } from './erasure.service';

@Controller('users')
export class ErasureController {
  constructor(private readonly erasureService: ErasureService) {}

  /**
   * Delete all of a user's attempts and progress.
   * WARNING: This action is IRREVERSIBLE.
   */
  @Delete(':userId/progress')
  @Version('1')
  @HttpCode(HttpStatus.OK)
  async clearProgress(@Param('userId') userId: string): Promise<Ack> {
    return this.erasureService.clearProgress(userId);
  }
}
