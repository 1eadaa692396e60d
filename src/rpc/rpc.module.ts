import { ConfigModule } from '@config/config.module';
import { Module } from '@nestjs/common';
import { BitcoinRpcClient } from './bitcoin-rpc.client';

@Module({
  imports: [ConfigModule],
  providers: [BitcoinRpcClient],
  exports: [BitcoinRpcClient],
})
export class RpcModule {}
