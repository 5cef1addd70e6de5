import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import compression from 'compression';
import helmet from 'helmet';
import { ServingExceptionFilter } from './common/filters/serving-exception.filter';
import { jsonBody } from './common/middleware/json-body.middleware';
import { requestLogging } from './common/middleware/request-logging.middleware';
import { ModelRegistryService } from './model/model-registry.service';

/**
 * Middleware, filters and API docs shared by main.ts and the HTTP tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  // First, so every response is logged, rejected ones included
  app.use(requestLogging);

  // Security + performance
  app.use(helmet());
  app.use(compression());

  // No auth on this service; any origin may call it
  app.enableCors({ origin: true });

  app.use(jsonBody);
  app.useGlobalFilters(new ServingExceptionFilter(app.get(ModelRegistryService)));

  const docs = new DocumentBuilder()
    .setTitle('Solar Power Prediction API')
    .setDescription('Production-ready API for Solar Irradiance Forecasting')
    .setVersion('2.0')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, docs));

  return app;
}
