import { Module } from '@nestjs/common';
import { RpcModule } from '@rpc/rpc.module';
import { PodCollectorService } from './pod-collector.service';

@Module({
  imports: [RpcModule],
  providers: [PodCollectorService],
  exports: [PodCollectorService],
})
export class CollectorModule {}
