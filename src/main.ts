import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  // Reject malformed payloads before they reach the calculators
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.get<number>('settlement.port', 3000);
  await app.listen(port);

  logger.log(`Settlement API is running on port ${port}`);
  logger.log(`Environment: ${process.env.NODE_ENV || 'not set'}`);
  logger.log(
    `Tariff validity evaluated in time zone ${configService.get<string>('settlement.timeZone')}`,
  );
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  new Logger('Bootstrap').error(`Failed to start settlement API: ${message}`, stack);
  process.exit(1);
});
