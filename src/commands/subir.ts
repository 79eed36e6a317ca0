import { existsSync } from 'fs';
import type { Command } from 'commander';
import { z } from 'zod';
import { subirABigQuery, prepararFila } from '../services/bigquery.js';
import { leerJsonRegistros } from '../services/export-json.js';
import type { ObjetoJson } from '../services/export-json.js';
import { subirAFirestore } from '../services/firestore.js';
import { upsertProcesos } from '../services/supabase.js';
import { logger } from '../utils/logger.js';
import { parsearOpciones } from './opciones.js';

const opcionesBigQuery = z.object({
  projectId: z.string().min(1),
  dataset: z.string().min(1),
  table: z.string().min(1),
  credentials: z.string().min(1).optional(),
  idField: z.string().min(1).default('numero_proceso'),
});

const opcionesFirestore = z.object({
  collection: z.string().min(1).default('procesos_tics'),
  projectId: z.string().min(1).optional(),
  credentials: z.string().min(1).optional(),
  idField: z.string().min(1).default('numero_proceso'),
});

const opcionesSupabase = z.object({
  table: z.string().min(1).default('procesos_compras'),
  idField: z.string().min(1).default('numero_proceso'),
});

export function cargarRegistros(ruta: string): ObjetoJson[] {
  if (!existsSync(ruta)) {
    throw new Error(`No se encontró el archivo JSON: ${ruta}`);
  }
  const registros = leerJsonRegistros(ruta);
  if (registros.length === 0) {
    throw new Error(`El archivo JSON no tiene registros: ${ruta}`);
  }
  logger.info('Registros leídos de %s: %d', ruta, registros.length);
  return registros;
}

export function registrarSubidas(program: Command): void {
  program
    .command('subir-bigquery')
    .description('Carga un JSON en una tabla de BigQuery (load job, WRITE_APPEND)')
    .argument('<json>', 'archivo JSON con una lista de registros')
    .requiredOption('--project-id <id>', 'proyecto de Google Cloud')
    .requiredOption('--dataset <id>', 'dataset de BigQuery')
    .requiredOption('--table <nombre>', 'tabla de BigQuery')
    .option('--credentials <ruta>', 'JSON de la service account')
    .option('--id-field <campo>', 'campo usado como doc_id', 'numero_proceso')
    .action(async (json: string, crudas: unknown) => {
      const opciones = parsearOpciones(opcionesBigQuery, crudas);
      const registros = cargarRegistros(json);
      const subidos = await subirABigQuery(registros, opciones, opciones.idField);
      logger.info('Subida a BigQuery finalizada: %d filas', subidos);
    });

  program
    .command('subir-firestore')
    .description('Sube un JSON a una colección de Firestore (un documento por registro)')
    .argument('<json>', 'archivo JSON con una lista de registros')
    .option('--collection <nombre>', 'colección destino', 'procesos_tics')
    .option('--project-id <id>', 'proyecto de Google Cloud')
    .option('--credentials <ruta>', 'JSON de la service account')
    .option('--id-field <campo>', 'campo usado como id de documento', 'numero_proceso')
    .action(async (json: string, crudas: unknown) => {
      const opciones = parsearOpciones(opcionesFirestore, crudas);
      const registros = cargarRegistros(json);
      await subirAFirestore(registros, opciones, opciones.idField);
    });

  program
    .command('subir-supabase')
    .description('Hace upsert de un JSON en una tabla de Supabase, por doc_id')
    .argument('<json>', 'archivo JSON con una lista de registros')
    .option('--table <nombre>', 'tabla destino', 'procesos_compras')
    .option('--id-field <campo>', 'campo usado como doc_id', 'numero_proceso')
    .action(async (json: string, crudas: unknown) => {
      const opciones = parsearOpciones(opcionesSupabase, crudas);
      const fechaCarga = new Date();
      const filas = cargarRegistros(json).map((rec) => prepararFila(rec, opciones.idField, fechaCarga));
      await upsertProcesos(filas, opciones.table);
    });
}
