import { ConfigModule } from '@config/config.module';
import { Module } from '@nestjs/common';
import { DnsHostResolver, HostResolver } from './host-resolver';
import { PodDiscoveryService } from './pod-discovery.service';

@Module({
  imports: [ConfigModule],
  providers: [PodDiscoveryService, { provide: HostResolver, useClass: DnsHostResolver }],
  exports: [PodDiscoveryService],
})
export class DiscoveryModule {}
