import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';

@Entity('prioridades')
export class IncidenciaPriority {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 20, unique: true, name: 'codigo' })
  code!: string;

  @Column({ type: 'varchar', length: 50, name: 'nombre' })
  name!: string;

  @Column({ type: 'text', nullable: true, name: 'descripcion' })
  description!: string | null;

  @Column({ type: 'int', name: 'nivel' })
  level!: number;

  @Column({ type: 'varchar', length: 7, nullable: true })
  color!: string | null;

  @Column({ type: 'boolean', default: true, name: 'activo' })
  active!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;
}
