import { BadRequestException } from '@nestjs/common';

export type CatalogName = 'estado' | 'prioridad' | 'categoria';

export class CatalogCodeException extends BadRequestException {
  constructor(catalog: CatalogName, code: string) {
    super(`Unknown ${catalog} code "${code}"`);
  }
}
