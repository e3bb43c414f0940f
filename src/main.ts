import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';
import { initTracer, shutdownTracer } from './shared/tracing/tracer';

const serviceName = process.env.SERVICE_NAME || 'flashcard-generation-service';
const tracer = initTracer(serviceName);

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);
  const host = configService.get<string>('TCP_HOST', '0.0.0.0');
  const port = Number(
    configService.get<string>('TCP_PORT') ??
      configService.get<string>('PORT', '4010'),
  );

  // TCP microservice is the only transport
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: { host, port },
  });

  await app.startAllMicroservices();
  await app.init();
  logger.log(`📡 Flashcard TCP microservice is running on ${host}:${port}`);
}

void bootstrap();

process.on('SIGTERM', () => {
  void (async () => {
    await shutdownTracer(tracer);
    process.exit(0);
  })();
});

process.on('SIGINT', () => {
  void (async () => {
    await shutdownTracer(tracer);
    process.exit(0);
  })();
});
