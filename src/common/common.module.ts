import { Global, Module } from '@nestjs/common';
import { ReservationLockService } from './locks/reservation-lock.service';

@Global()
@Module({
  providers: [ReservationLockService],
  exports: [ReservationLockService],
})
export class CommonModule {}
