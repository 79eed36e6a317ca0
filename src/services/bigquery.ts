import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BigQuery } from '@google-cloud/bigquery';
import type { ProcesoCompra } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { extraerAnio, sanitizarDocId } from '../utils/text.js';
import type { ObjetoJson } from './export-json.js';

/**
 * Fila de la tabla procesos_tics (mismo esquema en BigQuery y Supabase).
 */
export interface FilaAlmacen {
  doc_id: string | null;
  n: unknown;
  numero_proceso: unknown;
  expediente: unknown;
  nombre_proceso: unknown;
  tipo_proceso: unknown;
  fecha_apertura: unknown;
  estado: unknown;
  unidad_ejecutora: unknown;
  saf: unknown;
  detalle_productos_servicios: unknown;
  pliego_numero: unknown;
  link: unknown;
  origen: unknown;
  es_tic: unknown;
  anio: number | null;
  fecha_carga: string;
}

export interface DestinoBigQuery {
  projectId: string;
  dataset: string;
  table: string;
  credentials?: string;
}

function valor(rec: ObjetoJson, clave: string): unknown {
  return rec[clave] ?? null;
}

function anioDe(rec: ObjetoJson): number | null {
  const anio = rec.anio;
  if (typeof anio === 'number' && anio) return anio;
  const fecha = rec.fecha_apertura;
  return typeof fecha === 'string' ? extraerAnio(fecha) : null;
}

/**
 * Registro del modelo procesos_tics → fila de la tabla.
 */
export function prepararFila(rec: ObjetoJson, idField = 'numero_proceso', fechaCarga = new Date()): FilaAlmacen {
  const base = rec[idField];
  const docId = base !== undefined && base !== null && base !== '' ? sanitizarDocId(String(base)) : null;

  return {
    doc_id: docId,
    n: valor(rec, 'n'),
    numero_proceso: valor(rec, 'numero_proceso'),
    expediente: valor(rec, 'expediente'),
    nombre_proceso: valor(rec, 'nombre_proceso'),
    tipo_proceso: valor(rec, 'tipo_proceso'),
    fecha_apertura: valor(rec, 'fecha_apertura'),
    estado: valor(rec, 'estado'),
    unidad_ejecutora: valor(rec, 'unidad_ejecutora'),
    saf: valor(rec, 'saf'),
    detalle_productos_servicios: valor(rec, 'detalle_productos_servicios'),
    pliego_numero: valor(rec, 'pliego_numero'),
    link: valor(rec, 'link'),
    origen: valor(rec, 'origen'),
    es_tic: valor(rec, 'es_tic'),
    anio: anioDe(rec),
    fecha_carga: fechaCarga.toISOString(),
  };
}

/**
 * Registro scrapeado → modelo procesos_tics (claves del Excel convertido).
 */
export function aModeloTics(registro: ProcesoCompra): ObjetoJson {
  return {
    n: null,
    numero_proceso: registro.numero_proceso,
    expediente: registro.expediente,
    nombre_proceso: registro.nombre_proceso,
    tipo_proceso: registro.tipo_proceso,
    fecha_apertura: registro.fecha_apertura,
    estado: registro.estado,
    unidad_ejecutora: registro.unidad_ejecutora,
    saf: registro.saf,
    detalle_productos_servicios: registro.detalle_productos,
    pliego_numero: registro.pliego_nombre,
    link: registro.url_detalle ?? registro.pliego_url,
    origen: registro.origen,
    es_tic: registro.es_tic,
    anio: registro.anio,
  };
}

export function verificarCredenciales(ruta: string | undefined): void {
  if (ruta && !existsSync(ruta)) {
    throw new Error(`No se encontró el archivo de credenciales: ${ruta}`);
  }
}

export function crearClienteBigQuery(projectId: string, credentials?: string): BigQuery {
  verificarCredenciales(credentials);
  if (credentials) {
    logger.info('Usando credenciales: %s', credentials);
    return new BigQuery({ projectId, keyFilename: credentials });
  }
  logger.info('Usando credenciales por defecto');
  return new BigQuery({ projectId });
}

/**
 * Carga por LOAD JOB (NDJSON, WRITE_APPEND); nunca streaming inserts.
 */
export async function subirABigQuery(
  registros: readonly ObjetoJson[],
  destino: DestinoBigQuery,
  idField = 'numero_proceso'
): Promise<number> {
  const client = crearClienteBigQuery(destino.projectId, destino.credentials);
  const tableRef = `${destino.projectId}.${destino.dataset}.${destino.table}`;
  logger.info('Tabla destino: %s', tableRef);

  const fechaCarga = new Date();
  const filas = registros.map((rec) => prepararFila(rec, idField, fechaCarga));
  logger.info('Filas a insertar: %d', filas.length);
  if (filas.length === 0) return 0;

  const dir = mkdtempSync(join(tmpdir(), 'compras-bq-'));
  const archivo = join(dir, 'filas.ndjson');
  try {
    writeFileSync(archivo, filas.map((f) => JSON.stringify(f)).join('\n'), 'utf-8');

    const table = client.dataset(destino.dataset).table(destino.table);
    logger.info('Iniciando LOAD JOB en BigQuery...');
    await table.load(archivo, {
      sourceFormat: 'NEWLINE_DELIMITED_JSON',
      writeDisposition: 'WRITE_APPEND',
    });
    logger.info('Load job completado sin errores');

    const [metadata] = await table.getMetadata();
    logger.info('Filas totales en la tabla ahora: %s', String(metadata.numRows ?? 'N/A'));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }

  return filas.length;
}
