/**
 * Migration: CreateIncidenciasSchema
 *
 * Creates the catalog tables (estados, prioridades, categorias) with their
 * seed rows, the incidencias table and its child tables (comentarios,
 * adjuntos, historial_incidencias).
 *
 * historial_incidencias has no foreign key to incidencias so that entries
 * can outlive a deleted incidencia.
 */

import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateIncidenciasSchema1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE estados (
        id SERIAL PRIMARY KEY,
        codigo VARCHAR(20) UNIQUE NOT NULL,
        nombre VARCHAR(50) NOT NULL,
        descripcion TEXT,
        orden INTEGER NOT NULL DEFAULT 0,
        activo BOOLEAN NOT NULL DEFAULT TRUE,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await queryRunner.query(`
      INSERT INTO estados (codigo, nombre, descripcion, orden) VALUES
        ('pendiente', 'Pendiente', 'Incidencia creada pero no asignada', 1),
        ('asignada', 'Asignada', 'Incidencia asignada a un responsable', 2),
        ('en_proceso', 'En Proceso', 'El responsable está trabajando en la incidencia', 3),
        ('resuelta', 'Resuelta', 'Incidencia resuelta, pendiente de cierre', 4),
        ('cerrada', 'Cerrada', 'Incidencia cerrada definitivamente', 5),
        ('cancelada', 'Cancelada', 'Incidencia cancelada', 6)
    `);

    await queryRunner.query(`
      CREATE TABLE prioridades (
        id SERIAL PRIMARY KEY,
        codigo VARCHAR(20) UNIQUE NOT NULL,
        nombre VARCHAR(50) NOT NULL,
        descripcion TEXT,
        nivel INTEGER NOT NULL,
        color VARCHAR(7),
        activo BOOLEAN NOT NULL DEFAULT TRUE,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await queryRunner.query(`
      INSERT INTO prioridades (codigo, nombre, descripcion, nivel, color) VALUES
        ('baja', 'Baja', 'No urgente, puede esperar', 1, '#28A745'),
        ('media', 'Media', 'Prioridad normal', 2, '#FFC107'),
        ('alta', 'Alta', 'Requiere atención pronta', 3, '#FD7E14'),
        ('urgente', 'Urgente', 'Requiere atención inmediata', 4, '#DC3545')
    `);

    await queryRunner.query(`
      CREATE TABLE categorias (
        id SERIAL PRIMARY KEY,
        codigo VARCHAR(50) UNIQUE NOT NULL,
        nombre VARCHAR(100) NOT NULL,
        descripcion TEXT,
        activo BOOLEAN NOT NULL DEFAULT TRUE,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await queryRunner.query(`
      INSERT INTO categorias (codigo, nombre, descripcion) VALUES
        ('infraestructura', 'Infraestructura', 'Problemas de edificios, aulas, mobiliario'),
        ('tecnologia', 'Tecnología', 'Problemas de equipos, redes, software'),
        ('servicios', 'Servicios', 'Problemas con servicios generales'),
        ('seguridad', 'Seguridad', 'Incidencias de seguridad'),
        ('limpieza', 'Limpieza', 'Problemas de limpieza y mantenimiento'),
        ('otros', 'Otros', 'Otras incidencias no categorizadas')
    `);

    // Reporter, responsible and location ids belong to other services: no FKs
    await queryRunner.query(`
      CREATE TABLE incidencias (
        id SERIAL PRIMARY KEY,
        titulo VARCHAR(200) NOT NULL,
        descripcion TEXT NOT NULL,
        estado_id INTEGER NOT NULL REFERENCES estados(id),
        prioridad_id INTEGER NOT NULL REFERENCES prioridades(id),
        categoria_id INTEGER REFERENCES categorias(id),
        usuario_reportante_id TEXT NOT NULL,
        responsable_id TEXT,
        salon_id TEXT,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        fecha_actualizacion TIMESTAMP WITH TIME ZONE,
        fecha_resolucion TIMESTAMP WITH TIME ZONE,
        version INTEGER NOT NULL DEFAULT 1
      )
    `);

    await queryRunner.query(`CREATE INDEX idx_incidencias_titulo ON incidencias (titulo)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_estado ON incidencias (estado_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_prioridad ON incidencias (prioridad_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_categoria ON incidencias (categoria_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_usuario_reportante ON incidencias (usuario_reportante_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_responsable ON incidencias (responsable_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_salon ON incidencias (salon_id)`);
    await queryRunner.query(`CREATE INDEX idx_incidencias_fecha_creacion ON incidencias (fecha_creacion)`);

    await queryRunner.query(`
      CREATE TABLE historial_incidencias (
        id SERIAL PRIMARY KEY,
        incidencia_id INTEGER NOT NULL,
        accion VARCHAR(100) NOT NULL,
        descripcion TEXT,
        usuario_id TEXT NOT NULL,
        valor_anterior JSONB,
        valor_nuevo JSONB,
        fecha_cambio TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await queryRunner.query(`CREATE INDEX idx_historial_incidencia ON historial_incidencias (incidencia_id)`);
    await queryRunner.query(`CREATE INDEX idx_historial_usuario ON historial_incidencias (usuario_id)`);
    await queryRunner.query(`CREATE INDEX idx_historial_fecha ON historial_incidencias (fecha_cambio)`);

    await queryRunner.query(`
      CREATE TABLE adjuntos (
        id SERIAL PRIMARY KEY,
        incidencia_id INTEGER NOT NULL REFERENCES incidencias(id) ON DELETE CASCADE,
        nombre_archivo VARCHAR(255) NOT NULL,
        tipo_mime VARCHAR(100),
        tamanio_bytes BIGINT,
        ruta_almacenamiento TEXT NOT NULL,
        usuario_id TEXT NOT NULL,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await queryRunner.query(`CREATE INDEX idx_adjuntos_incidencia ON adjuntos (incidencia_id)`);

    await queryRunner.query(`
      CREATE TABLE comentarios (
        id SERIAL PRIMARY KEY,
        incidencia_id INTEGER NOT NULL REFERENCES incidencias(id) ON DELETE CASCADE,
        usuario_id TEXT NOT NULL,
        contenido TEXT NOT NULL,
        es_interno BOOLEAN NOT NULL DEFAULT FALSE,
        fecha_creacion TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        fecha_actualizacion TIMESTAMP WITH TIME ZONE
      )
    `);

    await queryRunner.query(`CREATE INDEX idx_comentarios_incidencia ON comentarios (incidencia_id)`);
    await queryRunner.query(`CREATE INDEX idx_comentarios_usuario ON comentarios (usuario_id)`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS comentarios`);
    await queryRunner.query(`DROP TABLE IF EXISTS adjuntos`);
    await queryRunner.query(`DROP TABLE IF EXISTS historial_incidencias`);
    await queryRunner.query(`DROP TABLE IF EXISTS incidencias`);
    await queryRunner.query(`DROP TABLE IF EXISTS categorias`);
    await queryRunner.query(`DROP TABLE IF EXISTS prioridades`);
    await queryRunner.query(`DROP TABLE IF EXISTS estados`);
  }
}
