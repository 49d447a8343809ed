import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';

/**
 * Catalog row for an incidencia lifecycle state.
 * `rank` orders states for display; the transition rules themselves live in
 * the incidencia state machine, keyed by `code`.
 */
@Entity('estados')
export class IncidenciaState {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 20, unique: true, name: 'codigo' })
  code!: string;

  @Column({ type: 'varchar', length: 50, name: 'nombre' })
  name!: string;

  @Column({ type: 'text', nullable: true, name: 'descripcion' })
  description!: string | null;

  @Column({ type: 'int', default: 0, name: 'orden' })
  rank!: number;

  @Column({ type: 'boolean', default: true, name: 'activo' })
  active!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;
}
