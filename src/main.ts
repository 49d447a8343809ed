import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { validateEnvironmentVariables } from './common/config/env.validation';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { LoggingService } from './modules/logging/logging.service';
import { buildSwaggerConfig, swaggerCustomOptions } from './modules/swagger/swagger.config';

async function bootstrap() {
  // Validate environment variables before starting application
  validateEnvironmentVariables();

  // Create Winston-based logger before NestFactory to capture bootstrap logs
  const loggingService = new LoggingService();

  const app = await NestFactory.create(AppModule, {
    logger: loggingService,
  });

  app.useGlobalFilters(new HttpExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  });

  const swaggerConfig = buildSwaggerConfig();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document, swaggerCustomOptions);

  const port = process.env.PORT || 3001;
  await app.listen(port);
  loggingService.log(`Incidencias API is running on: http://localhost:${port}`, 'Bootstrap');
  loggingService.log(`Swagger UI available at: http://localhost:${port}/api/docs`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.stack : String(err);
  new Logger('Bootstrap').error(`Failed to start Incidencias API: ${message}`);
  process.exit(1);
});
