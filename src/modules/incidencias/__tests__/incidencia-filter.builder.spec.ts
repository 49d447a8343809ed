import { CatalogCodeException } from '../../catalog/catalog.exceptions';
import { IncidenciaFilterBuilder } from '../services/incidencia-filter.builder';
import {
  ADMIN,
  STUDENT,
  createIncidenciasTestContext,
} from './incidencias-test-context';

describe('IncidenciaFilterBuilder', () => {
  let filterBuilder: IncidenciaFilterBuilder;

  beforeEach(async () => {
    ({ filterBuilder } = await createIncidenciasTestContext());
  });

  it('should resolve catalog codes to ids', async () => {
    const where = await filterBuilder.build(ADMIN, {
      stateCode: 'asignada',
      priorityCode: 'urgente',
      categoryCode: 'limpieza',
    });

    expect(where).toEqual({ stateId: 2, priorityId: 4, categoryId: 5 });
  });

  it('should apply reporter and responsible filters for administrators', async () => {
    const where = await filterBuilder.build(ADMIN, {
      reporterId: 's9',
      responsibleId: 'tech1',
    });

    expect(where).toEqual({ reporterId: 's9', responsibleId: 'tech1' });
  });

  it('should force the reporter for non-administrators and drop their reporter/responsible filters', async () => {
    const where = await filterBuilder.build(STUDENT, {
      reporterId: 's9',
      responsibleId: 'tech1',
      priorityCode: 'alta',
    });

    expect(where).toEqual({ priorityId: 3, reporterId: 's1' });
  });

  it('should reject unknown codes', async () => {
    await expect(
      filterBuilder.build(ADMIN, { stateCode: 'archivada' }),
    ).rejects.toThrow(CatalogCodeException);
    await expect(
      filterBuilder.build(ADMIN, { categoryCode: 'obsoleta' }),
    ).rejects.toThrow('Unknown categoria code "obsoleta"');
  });
});
