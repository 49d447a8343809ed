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
 * Attachment metadata. The file itself lives in external storage;
 * `storagePath` is opaque to this service.
 */
@Entity('adjuntos')
export class IncidenciaAttachment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_adjuntos_incidencia')
  @Column({ type: 'int', name: 'incidencia_id' })
  incidenciaId!: number;

  @ManyToOne(() => Incidencia, (incidencia) => incidencia.attachments, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'incidencia_id' })
  incidencia?: Incidencia;

  @Column({ type: 'varchar', length: 255, name: 'nombre_archivo' })
  filename!: string;

  @Column({ type: 'varchar', length: 100, nullable: true, name: 'tipo_mime' })
  mimeType!: string | null;

  // pg returns BIGINT as a string
  @Column({
    type: 'bigint',
    nullable: true,
    name: 'tamanio_bytes',
    transformer: {
      to: (value: number | null) => value,
      from: (value: string | null) => (value === null ? null : Number(value)),
    },
  })
  sizeBytes!: number | null;

  @Column({ type: 'text', name: 'ruta_almacenamiento' })
  storagePath!: string;

  @Column({ type: 'text', name: 'usuario_id' })
  uploaderId!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;
}
