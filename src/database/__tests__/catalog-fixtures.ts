import { IncidenciaState } from '../entities/incidencia-state.entity';
import { IncidenciaPriority } from '../entities/incidencia-priority.entity';
import { IncidenciaCategory } from '../entities/incidencia-category.entity';
import { InMemoryEntityManager } from './in-memory-data-source';

const createdAt = new Date('2024-01-01T00:00:00.000Z');

/**
 * Catalog rows matching the migration seed. Ids follow insertion order.
 * `obsoleta` is an extra, inactive category.
 */
export function seedCatalogs(manager: InMemoryEntityManager): void {
  manager.seed(IncidenciaState, [
    { id: 1, code: 'pendiente', name: 'Pendiente', description: null, rank: 1, active: true, createdAt },
    { id: 2, code: 'asignada', name: 'Asignada', description: null, rank: 2, active: true, createdAt },
    { id: 3, code: 'en_proceso', name: 'En Proceso', description: null, rank: 3, active: true, createdAt },
    { id: 4, code: 'resuelta', name: 'Resuelta', description: null, rank: 4, active: true, createdAt },
    { id: 5, code: 'cerrada', name: 'Cerrada', description: null, rank: 5, active: true, createdAt },
    { id: 6, code: 'cancelada', name: 'Cancelada', description: null, rank: 6, active: true, createdAt },
  ]);

  manager.seed(IncidenciaPriority, [
    { id: 1, code: 'baja', name: 'Baja', description: null, level: 1, color: '#28A745', active: true, createdAt },
    { id: 2, code: 'media', name: 'Media', description: null, level: 2, color: '#FFC107', active: true, createdAt },
    { id: 3, code: 'alta', name: 'Alta', description: null, level: 3, color: '#FD7E14', active: true, createdAt },
    { id: 4, code: 'urgente', name: 'Urgente', description: null, level: 4, color: '#DC3545', active: true, createdAt },
  ]);

  manager.seed(IncidenciaCategory, [
    { id: 1, code: 'infraestructura', name: 'Infraestructura', description: null, active: true, createdAt },
    { id: 2, code: 'tecnologia', name: 'Tecnología', description: null, active: true, createdAt },
    { id: 3, code: 'servicios', name: 'Servicios', description: null, active: true, createdAt },
    { id: 4, code: 'seguridad', name: 'Seguridad', description: null, active: true, createdAt },
    { id: 5, code: 'limpieza', name: 'Limpieza', description: null, active: true, createdAt },
    { id: 6, code: 'otros', name: 'Otros', description: null, active: true, createdAt },
    { id: 7, code: 'obsoleta', name: 'Obsoleta', description: null, active: false, createdAt },
  ]);
}
