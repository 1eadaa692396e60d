import 'reflect-metadata';
import { AppModule } from '@/app.module';
import { ScrapeExceptionFilter } from '@common/filters/scrape-exception.filter';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { NestFactory } from '@nestjs/core';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const customLogger = app.get(CustomLoggerService);
  app.useLogger(customLogger);
  app.useGlobalFilters(new ScrapeExceptionFilter());

  const configService = app.get(ConfigService);
  const port = configService.getPort();

  await app.listen(port, '0.0.0.0');

  customLogger.logStartupInfo(port, configService.environment);
  customLogger.log(`Prometheus metrics available at /metrics`, 'Bootstrap');

  // Nothing is persisted, so shutdown only closes the listener
  const shutdown = async () => {
    customLogger.logShutdownInfo();
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch(error => {
        console.error('Failed to shut down cleanly:', error);
        process.exit(1);
      });
    });
  }
}

bootstrap().catch(error => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
