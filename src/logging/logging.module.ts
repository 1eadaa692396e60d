import { ConfigModule } from '@config/config.module';
import { CustomLoggerService } from '@logging/logger.service';
import { Module } from '@nestjs/common';

@Module({
  imports: [ConfigModule],
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggingModule {}
