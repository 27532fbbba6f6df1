import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { EnvironmentVariables } from './config/environment';
import { CREDENTIALS } from './modules';
import { WebhookCredentials } from './core';

async function bootstrap() {
  // The webhook pipeline reads request bodies itself
  const app = await NestFactory.create(AppModule, { bodyParser: false });
  const logger = new Logger('Bootstrap');
  const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);

  const prefix = config.get('API_PREFIX', { infer: true });
  if (prefix) {
    app.setGlobalPrefix(prefix);
  }

  if (config.get('SWAGGER_ENABLED', { infer: true })) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('CI Webhook Relay')
        .setDescription(
          'Authenticates CI provider webhooks by HMAC-SHA256 signature and forwards them as internal events.',
        )
        .setVersion('0.1.0')
        .addTag('Ingest', 'Receive signed webhooks')
        .addTag('Health', 'Liveness and readiness')
        .build(),
    );
    SwaggerModule.setup('api', app, document);
  }

  // SIGHUP re-reads the secret file
  const credentials = app.get<WebhookCredentials>(CREDENTIALS);
  process.on('SIGHUP', () => {
    credentials.reload().then(
      (changed) => logger.log(changed ? 'Webhook secret reloaded' : 'Webhook secret unchanged'),
      (error: unknown) =>
        logger.error(
          `Webhook secret reload failed: ${error instanceof Error ? error.message : String(error)}`,
        ),
    );
  });

  app.enableShutdownHooks();

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  logger.log(`CI webhook relay is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
