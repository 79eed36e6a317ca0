import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import type { ProcesoCompra } from '../types/index.js';
import { logger } from '../utils/logger.js';

type ValorCelda = string | number | boolean | null;

export interface Columna {
  titulo: string;
  valor: (registro: ProcesoCompra) => ValorCelda;
}

export const COLUMNAS_BASE: readonly Columna[] = [
  { titulo: 'Número proceso', valor: (r) => r.numero_proceso },
  { titulo: 'Expediente', valor: (r) => r.expediente },
  { titulo: 'Nombre proceso', valor: (r) => r.nombre_proceso },
  { titulo: 'Tipo de Proceso', valor: (r) => r.tipo_proceso },
  { titulo: 'Fecha de apertura', valor: (r) => r.fecha_apertura },
  { titulo: 'Estado', valor: (r) => r.estado },
  { titulo: 'Unidad Ejecutora', valor: (r) => r.unidad_ejecutora },
  { titulo: 'Servicio Administrativo Financiero', valor: (r) => r.saf },
  { titulo: 'Detalle de productos o servicios', valor: (r) => r.detalle_productos },
  { titulo: 'Pliego N°', valor: (r) => r.pliego_nombre },
  { titulo: 'LINK', valor: (r) => r.url_detalle },
  { titulo: 'BORA/COMPRAR', valor: (r) => r.origen },
  { titulo: 'Es TIC', valor: (r) => r.es_tic },
];

export const COLUMNAS_BOLETIN: readonly Columna[] = [
  ...COLUMNAS_BASE,
  { titulo: 'Organismo', valor: (r) => r.unidad_ejecutora },
  { titulo: 'Fecha de publicación', valor: (r) => r.fecha_publicacion ?? null },
  { titulo: 'Fecha de edición', valor: (r) => r.fecha_edicion ?? null },
  { titulo: 'Título listado', valor: (r) => r.titulo_listado ?? null },
  { titulo: 'Resumen', valor: (r) => r.resumen ?? null },
];

export function aFilasXlsx(
  registros: readonly ProcesoCompra[],
  columnas: readonly Columna[]
): Record<string, ValorCelda>[] {
  return registros.map((registro) =>
    Object.fromEntries(columnas.map((columna) => [columna.titulo, columna.valor(registro)]))
  );
}

/**
 * Escribe los registros en una hoja "Procesos" con encabezados en castellano.
 */
export function escribirXlsx(
  registros: readonly ProcesoCompra[],
  ruta: string,
  columnas: readonly Columna[] = COLUMNAS_BASE
): string {
  const hoja = XLSX.utils.json_to_sheet(aFilasXlsx(registros, columnas), {
    header: columnas.map((c) => c.titulo),
  });
  const libro = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(libro, hoja, 'Procesos');

  mkdirSync(dirname(ruta), { recursive: true });
  const buffer: Buffer = XLSX.write(libro, { type: 'buffer', bookType: 'xlsx' });
  writeFileSync(ruta, buffer);

  logger.info('Exportados %d procesos a %s', registros.length, ruta);
  return ruta;
}
