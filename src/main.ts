import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  // webhook signatures are computed over the exact request bytes
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('PayRoute Payments')
    .setDescription(
      'Multi-provider payment orchestration: authenticated webhook intake and provider health.',
    )
    .setVersion('0.1.0')
    .addTag('Webhooks', 'Receive and queue provider webhooks')
    .addTag('Health', 'Cached provider health and currencies')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Payments service running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
