import { IncidenciaState } from './incidencia-state.entity';
import { IncidenciaPriority } from './incidencia-priority.entity';
import { IncidenciaCategory } from './incidencia-category.entity';
import { Incidencia } from './incidencia.entity';
import { IncidenciaComment } from './incidencia-comment.entity';
import { IncidenciaAttachment } from './incidencia-attachment.entity';
import { IncidenciaHistoryEntry } from './incidencia-history.entity';

export {
  IncidenciaState,
  IncidenciaPriority,
  IncidenciaCategory,
  Incidencia,
  IncidenciaComment,
  IncidenciaAttachment,
  IncidenciaHistoryEntry,
};
export { HistoryAction, HistorySnapshot } from './incidencia-history.entity';

export const INCIDENCIAS_ENTITIES = [
  IncidenciaState,
  IncidenciaPriority,
  IncidenciaCategory,
  Incidencia,
  IncidenciaComment,
  IncidenciaAttachment,
  IncidenciaHistoryEntry,
];
