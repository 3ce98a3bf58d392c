import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import settlementConfig from './config/settlement.config';
import { SettlementModule } from './modules/settlement/settlement.module';

@Module({
  imports: [
    // Global configuration module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [settlementConfig],
    }),

    // Contractor cost and client revenue calculations
    SettlementModule,
  ],
})
export class AppModule {}
