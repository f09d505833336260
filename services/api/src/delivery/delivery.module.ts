import { Module } from '@nestjs/common';
import { ConnectionRegistry } from './connection-registry';
import { LocalDispatcher } from './local-dispatcher.service';

@Module({
  providers: [ConnectionRegistry, LocalDispatcher],
  exports: [ConnectionRegistry, LocalDispatcher],
})
export class DeliveryModule {}
