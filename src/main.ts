import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { AppEnv } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  const env = app.get<ConfigService<AppEnv, true>>(ConfigService);

  const swaggerPath = env.get('SWAGGER_PATH', { infer: true });
  const config = new DocumentBuilder()
    .setTitle('Matrix CI API')
    .setDescription('Matrix CI pipelines backed by PostgreSQL')
    .setVersion('0.1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(swaggerPath, app, document);

  const port = env.get('PORT', { infer: true });
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err), 'Bootstrap');
  process.exit(1);
});
