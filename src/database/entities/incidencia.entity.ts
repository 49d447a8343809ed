import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  VersionColumn,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Index,
} from 'typeorm';
import { IncidenciaState } from './incidencia-state.entity';
import { IncidenciaPriority } from './incidencia-priority.entity';
import { IncidenciaCategory } from './incidencia-category.entity';
import { IncidenciaComment } from './incidencia-comment.entity';
import { IncidenciaAttachment } from './incidencia-attachment.entity';

/**
 * Incidencia Entity
 *
 * A ticket filed by any authenticated user. Reporter, responsible party and
 * location are opaque identifiers owned by the identity and rooms services,
 * so they carry no foreign keys.
 *
 * `resolvedAt` is non-null exactly while the state is `resuelta` or `cerrada`.
 * `version` guards the conditional updates issued by the lifecycle service.
 */
@Entity('incidencias')
export class Incidencia {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_incidencias_titulo')
  @Column({ type: 'varchar', length: 200, name: 'titulo' })
  title!: string;

  @Column({ type: 'text', name: 'descripcion' })
  description!: string;

  @Index('idx_incidencias_estado')
  @Column({ type: 'int', name: 'estado_id' })
  stateId!: number;

  @ManyToOne(() => IncidenciaState, { eager: true })
  @JoinColumn({ name: 'estado_id' })
  state?: IncidenciaState;

  @Index('idx_incidencias_prioridad')
  @Column({ type: 'int', name: 'prioridad_id' })
  priorityId!: number;

  @ManyToOne(() => IncidenciaPriority, { eager: true })
  @JoinColumn({ name: 'prioridad_id' })
  priority?: IncidenciaPriority;

  @Index('idx_incidencias_categoria')
  @Column({ type: 'int', nullable: true, name: 'categoria_id' })
  categoryId!: number | null;

  @ManyToOne(() => IncidenciaCategory, { eager: true, nullable: true })
  @JoinColumn({ name: 'categoria_id' })
  category?: IncidenciaCategory | null;

  @Index('idx_incidencias_usuario_reportante')
  @Column({ type: 'text', name: 'usuario_reportante_id', update: false })
  reporterId!: string;

  @Index('idx_incidencias_responsable')
  @Column({ type: 'text', nullable: true, name: 'responsable_id' })
  responsibleId!: string | null;

  @Index('idx_incidencias_salon')
  @Column({ type: 'text', nullable: true, name: 'salon_id' })
  locationId!: string | null;

  @Index('idx_incidencias_fecha_creacion')
  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', nullable: true, name: 'fecha_actualizacion' })
  updatedAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'fecha_resolucion' })
  resolvedAt!: Date | null;

  @VersionColumn({ default: 1 })
  version!: number;

  @OneToMany(() => IncidenciaComment, (comment) => comment.incidencia)
  comments?: IncidenciaComment[];

  @OneToMany(() => IncidenciaAttachment, (attachment) => attachment.incidencia)
  attachments?: IncidenciaAttachment[];
}
