import { ExactPathMiddleware } from '@common/middleware/exact-path.middleware';
import { ConfigModule } from '@config/config.module';
import { HealthModule } from '@health/health.module';
import { LoggingModule } from '@logging/logging.module';
import { MetricsModule } from '@metrics/metrics.module';
import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';

@Module({
  imports: [ConfigModule, LoggingModule, MetricsModule, HealthModule],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(ExactPathMiddleware).forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
