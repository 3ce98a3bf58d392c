import { registerAs } from '@nestjs/config';
import { isValidTimeZone } from '../utils/calendar-date';

export const DEFAULT_SETTLEMENT_TIME_ZONE = 'America/Santiago';

export interface SettlementConfig {
  port: number;
  /** Zone used to decide which calendar day "today" is for tariff validity */
  timeZone: string;
}

export default registerAs('settlement', (): SettlementConfig => {
  const timeZone = process.env.SETTLEMENT_TIME_ZONE || DEFAULT_SETTLEMENT_TIME_ZONE;

  if (!isValidTimeZone(timeZone)) {
    throw new Error(`SETTLEMENT_TIME_ZONE must be an IANA time zone, received '${timeZone}'`);
  }

  return {
    port: parseInt(process.env.PORT || '3000', 10),
    timeZone,
  };
});
