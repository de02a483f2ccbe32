import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from './common/interceptors/response-transform.interceptor';
import type { EnvConfig } from './config/env.config';
import multipart from '@fastify/multipart';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: false }),
  );
  const config = app.get<ConfigService<EnvConfig, true>>(ConfigService);

  await app.register(multipart as never, {
    limits: { fileSize: config.get('MAX_UPLOAD_SIZE_MB', { infer: true }) * 1024 * 1024, files: 1 },
  });

  app.useGlobalFilters(new GlobalExceptionFilter());
  app.useGlobalInterceptors(new ResponseTransformInterceptor());

  // Swagger / OpenAPI — only in development (requires @fastify/static)
  if (config.get('NODE_ENV', { infer: true }) !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Sheetmap API')
      .setDescription('Metadata-driven XLSX generation, import and validation feedback.')
      .setVersion('0.1.0')
      .addTag('export', 'Generate workbooks from table definitions')
      .addTag('import', 'Read records from uploaded workbooks')
      .addTag('feedback', 'Annotate workbooks with validation results')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document);
  }

  const allowedOrigins = config
    .get('FRONTEND_URL', { infer: true })
    .split(',')
    .map((o) => o.trim().replace(/\/+$/, ''))
    .filter(Boolean);
  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow requests with no origin (server-to-server, health checks, curl)
      if (!origin || allowedOrigins.includes(origin.replace(/\/+$/, ''))) {
        callback(null, true);
        return;
      }
      logger.warn(`CORS blocked origin: ${origin} (allowed: ${allowedOrigins.join(', ')})`);
      callback(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition'],
  });

  const fastifyInstance = app.getHttpAdapter().getInstance();
  fastifyInstance.get('/api/health', (_req: unknown, reply: { send: (body: unknown) => void }) => {
    reply.send({ status: 'ok' });
  });

  const port = config.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');
  logger.log(`Sheetmap API running on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed:', err);
  process.exit(1);
});
