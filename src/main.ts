import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { WsAdapter } from '@nestjs/platform-ws';
import { AppModule } from './app.module';
import { EnvConfig } from './config/env.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  app.useWebSocketAdapter(new WsAdapter(app));

  const config = app.get(ConfigService<EnvConfig, true>);

  const allowedOrigins = config.get('allowedOrigins', { infer: true }).split(',').map((o) => o.trim().replace(/\/+$/, ''));
  app.enableCors({
    origin: allowedOrigins,
    credentials: true,
  });

  const port = config.get('port', { infer: true });
  await app.listen(port);
  logger.log(`Broker gateway listening on :${port}`);

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, () => {
      logger.log(`${sig} received, shutting down…`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(`Shutdown failed: ${err}`);
          process.exit(1);
        },
      );
    });
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Startup failed: ${err}`);
  process.exit(1);
});
