import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ADMIN_PASSWORD_HEADER } from './modules/relay/guards';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Transport stop, scheduler stop and the final stats write run on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Channel Relay')
    .setDescription(
      'Relays messages from source chats to one destination with link rewriting and duplicate suppression.',
    )
    .setVersion('0.1.0')
    .addBasicAuth()
    .addApiKey({ type: 'apiKey', in: 'header', name: ADMIN_PASSWORD_HEADER }, 'admin-password')
    .addTag('Filters', 'Ordered link filter rules')
    .addTag('Channels', 'Source chats and per-source counts')
    .addTag('Settings', 'Retention and duplicate-code settings')
    .addTag('Maintenance', 'Retention sweeps and state reset')
    .addTag('Query', 'Read-only SQL over the state database')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const cfg = app.get(ConfigService);
  const port = Number(cfg.get<string>('PORT') ?? 8000);
  await app.listen(port, '0.0.0.0');
  logger.log(`Channel relay admin API running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
