import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvConfigService } from '@infrastructure/config';
import { ApplicationErrorFilter } from '@infrastructure/http';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));

  // Enable CORS for frontend applications
  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error for unknown properties
      transform: true, // Auto-transform payloads to DTO instances
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );
  app.useGlobalFilters(new ApplicationErrorFilter());

  // Swagger API documentation
  const config = new DocumentBuilder()
    .setTitle('Coffee Shop Order API')
    .setDescription(
      `REST API for the coffee shop order service.

This API allows you to:
- Browse and maintain the menu
- Place orders and move them through preparation
- Manage customers, baristas and accounts`,
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('Auth', 'Registration and sign-in')
    .addTag('Menu', 'Coffee items and categories')
    .addTag('Orders', 'Order lifecycle')
    .addTag('Customers', 'Customer profiles')
    .addTag('Baristas', 'Barista profiles')
    .addTag('Health', 'Application health monitoring')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'list',
      filter: true,
      showRequestDuration: true,
    },
  });

  const port = app.get(EnvConfigService).port;
  await app.listen(port);

  app.get(Logger).log(`Coffee shop API listening on http://localhost:${port} (docs at /api/docs)`);
}

void bootstrap();
