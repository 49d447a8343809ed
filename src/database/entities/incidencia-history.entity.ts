import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export enum HistoryAction {
  CREATED = 'created',
  UPDATED = 'updated',
  ASSIGNED_RESPONSIBLE = 'assigned_responsible',
  STATE_CHANGED = 'state_changed',
  COMMENT_ADDED = 'comment_added',
  ATTACHMENT_ADDED = 'attachment_added',
  DELETED = 'deleted',
}

export type HistorySnapshot = Record<string, string | number | boolean | null>;

/**
 * Append-only audit record for an incidencia.
 *
 * `incidenciaId` has no foreign key: entries may outlive the
 * incidencia they describe when history retention is enabled.
 */
@Entity('historial_incidencias')
export class IncidenciaHistoryEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_historial_incidencia')
  @Column({ type: 'int', name: 'incidencia_id' })
  incidenciaId!: number;

  @Column({ type: 'varchar', length: 100, name: 'accion' })
  action!: HistoryAction;

  @Column({ type: 'text', nullable: true, name: 'descripcion' })
  description!: string | null;

  @Index('idx_historial_usuario')
  @Column({ type: 'text', name: 'usuario_id' })
  actorId!: string;

  @Column({ type: 'jsonb', nullable: true, name: 'valor_anterior' })
  before!: HistorySnapshot | null;

  @Column({ type: 'jsonb', nullable: true, name: 'valor_nuevo' })
  after!: HistorySnapshot | null;

  @Index('idx_historial_fecha')
  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_cambio' })
  createdAt!: Date;
}
