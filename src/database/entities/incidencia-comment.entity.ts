import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Incidencia } from './incidencia.entity';

/**
 * Comment on an incidencia. Internal comments are visible to administrators
 * only; the filtering happens in the comments service.
 */
@Entity('comentarios')
export class IncidenciaComment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_comentarios_incidencia')
  @Column({ type: 'int', name: 'incidencia_id' })
  incidenciaId!: number;

  @ManyToOne(() => Incidencia, (incidencia) => incidencia.comments, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'incidencia_id' })
  incidencia?: Incidencia;

  @Index('idx_comentarios_usuario')
  @Column({ type: 'text', name: 'usuario_id' })
  authorId!: string;

  @Column({ type: 'text', name: 'contenido' })
  content!: string;

  @Column({ type: 'boolean', default: false, name: 'es_interno' })
  isInternal!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', nullable: true, name: 'fecha_actualizacion' })
  updatedAt!: Date | null;
}
