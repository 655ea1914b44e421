import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, OpenAPIObject, SwaggerModule } from '@nestjs/swagger';

export const API_DOCS_PATH = 'api/docs';

export function createOpenApiDocument(app: INestApplication): OpenAPIObject {
  const config = new DocumentBuilder()
    .setTitle('Pharmacy order service')
    .setDescription('Patient carts, orders and payments')
    .setVersion('0.1.0')
    .addBearerAuth()
    .build();
  return SwaggerModule.createDocument(app, config);
}

/** Serves the OpenAPI document and its UI under /api/docs. Call after setGlobalPrefix. */
export function setupSwagger(app: INestApplication): void {
  SwaggerModule.setup(API_DOCS_PATH, app, createOpenApiDocument(app));
}
