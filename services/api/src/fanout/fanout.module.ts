import { Module } from '@nestjs/common';
import { DeliveryModule } from '../delivery/delivery.module';
import { FanoutService } from './fanout.service';

@Module({
  imports: [DeliveryModule],
  providers: [FanoutService],
  exports: [FanoutService],
})
export class FanoutModule {}
