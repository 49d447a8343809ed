import { ArgumentMetadata, Injectable, ParseIntPipe } from '@nestjs/common';
import { IncidenciaNotFoundException } from '../exceptions/incidencia.exceptions';
import { MAX_ROW_ID } from '../incidencias.config';

/**
 * ParseIntPipe for incidencia ids. Integers outside the primary-key range
 * cannot name a stored row, so they answer 404 before reaching the query.
 */
@Injectable()
export class ParseIncidenciaIdPipe extends ParseIntPipe {
  constructor() {
    super();
  }

  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await super.transform(value, metadata);
    if (id < 1 || id > MAX_ROW_ID) {
      throw new IncidenciaNotFoundException(id);
    }
    return id;
  }
}
