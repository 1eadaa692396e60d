import { Controller, Get, Header } from '@nestjs/common';

@Controller('health')
export class HealthController {
  /**
   * GET /health
   * Liveness probe. Does not touch the bitcoin nodes.
   */
  @Get()
  @Header('Content-Type', 'text/plain')
  getHealth(): string {
    return 'OK';
  }
}
