import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { readFileSync } from 'fs';
import { AppModule } from './app.module';
import { validateEnv } from './config/env.schema';
import { categorizeError } from './common/utils/error-categorizer';
import { StreamGateway } from './stream/stream.gateway';

async function bootstrap(): Promise<void> {
  // Validate environment variables before anything else
  const env = validateEnv();

  const tls = env.TLS_CERT_PATH && env.TLS_KEY_PATH
    ? { cert: readFileSync(env.TLS_CERT_PATH), key: readFileSync(env.TLS_KEY_PATH) }
    : null;

  const fastifyAdapter = new FastifyAdapter(tls ? { https: tls } : {});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, fastifyAdapter);

  const reportStartupErrorAndExit = (error: Error) => {
    if (process.uptime() > 60) {
      console.error(`[Error] ${error.message}`);
      return;
    }
    const category = categorizeError(error);
    console.error(`[Startup Error] ${category}: ${error.message}`);
    process.exit(1);
  };

  process.on('uncaughtException', (error: Error) => {
    reportStartupErrorAndExit(error);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    reportStartupErrorAndExit(error);
  });

  // Enable validation pipes globally
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));

  app.enableShutdownHooks();

  // Setup Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Tallystream API')
    .setDescription('Vehicle count ingestion, history and signed broadcast stream')
    .setVersion('0.1.0')
    .addTag('counts', 'Count ingestion, queries, export and retention')
    .addTag('audit', 'Security audit trail')
    .addTag('health', 'Health check endpoint')
    .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'x-api-key')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  // WebSocket upgrades for the broadcast stream share the HTTP(S) listener
  const gateway = app.get(StreamGateway);
  gateway.attach(app.getHttpServer());

  await app.listen(env.PORT, '0.0.0.0');

  const scheme = tls ? 'https' : 'http';
  const wsScheme = tls ? 'wss' : 'ws';
  console.log(`API server running on ${scheme}://localhost:${env.PORT}`);
  console.log(`Broadcast stream available at ${wsScheme}://localhost:${env.PORT}${env.STREAM_PATH}`);
  console.log(`API documentation available at ${scheme}://localhost:${env.PORT}/docs`);
}

bootstrap().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error(`[Startup Error] ${categorizeError(err)}: ${err.message}`);
  process.exit(1);
});
