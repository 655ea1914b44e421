import { applyDecorators, Type } from '@nestjs/common';
import { ApiExtraModels, ApiResponse, getSchemaPath } from '@nestjs/swagger';

interface ApiStdResponseOptions {
  status?: number;
  isArray?: boolean;
  description?: string;
}

/** Documents a `{ data, message }` envelope around `model`. */
export function ApiStdResponse(model: Type<unknown>, options: ApiStdResponseOptions = {}) {
  const data = options.isArray
    ? { type: 'array', items: { $ref: getSchemaPath(model) } }
    : { $ref: getSchemaPath(model) };

  return applyDecorators(
    ApiExtraModels(model),
    ApiResponse({
      status: options.status ?? 200,
      description: options.description,
      schema: {
        type: 'object',
        properties: {
          data,
          message: { type: 'string', nullable: true },
        },
      },
    }),
  );
}
