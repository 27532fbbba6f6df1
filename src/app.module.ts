import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { WebhookRelayModule } from './modules';
import { EnvironmentVariables, validateEnvironment } from './config/environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    WebhookRelayModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => ({
        credentials: {
          webhookSecret: config.get('WEBHOOK_SECRET', { infer: true }),
          secretFile: config.get('WEBHOOK_SECRET_FILE', { infer: true }),
        },
        events: {
          enableLogging: config.get('EVENT_LOGGING', { infer: true }),
        },
      }),
    }),
  ],
})
export class AppModule {}
