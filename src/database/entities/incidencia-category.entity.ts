import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
} from 'typeorm';

@Entity('categorias')
export class IncidenciaCategory {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true, name: 'codigo' })
  code!: string;

  @Column({ type: 'varchar', length: 100, name: 'nombre' })
  name!: string;

  @Column({ type: 'text', nullable: true, name: 'descripcion' })
  description!: string | null;

  @Column({ type: 'boolean', default: true, name: 'activo' })
  active!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'fecha_creacion' })
  createdAt!: Date;
}
