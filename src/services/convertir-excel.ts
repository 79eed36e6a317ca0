import { existsSync, readFileSync } from 'fs';
import { parse as parsePath, format as formatPath } from 'path';
import * as XLSX from 'xlsx';
import type { ObjetoJson } from './export-json.js';
import { escribirJson } from './export-json.js';
import { logger } from '../utils/logger.js';

export interface OpcionesConversion {
  hoja?: string;
  // 1 = primera fila de la planilla
  filaEncabezado?: number;
  modeloTics?: boolean;
}

// Encabezados de la planilla → claves del modelo procesos_tics
export const MAPA_MODELO_TICS: Readonly<Record<string, string>> = {
  'N°': 'n',
  'Nº': 'n',
  'Número proceso': 'numero_proceso',
  'Numero proceso': 'numero_proceso',
  Expediente: 'expediente',
  'Nombre proceso': 'nombre_proceso',
  'Tipo de Proceso': 'tipo_proceso',
  'Tipo de proceso': 'tipo_proceso',
  'Fecha de apertura': 'fecha_apertura',
  Estado: 'estado',
  'Unidad Ejecutora': 'unidad_ejecutora',
  'Servicio Administrativo Financiero': 'saf',
  'Detalle de productos o servicios': 'detalle_productos_servicios',
  'Pliego N°': 'pliego_numero',
  'Pliego No': 'pliego_numero',
  LINK: 'link',
  'BORA/COMPRAR': 'origen',
};

const esVacio = (valor: unknown) => valor === null || valor === undefined || valor === '';

/**
 * Saca filas y columnas completamente vacías.
 */
export function descartarVacios(filas: readonly ObjetoJson[]): ObjetoJson[] {
  const conDatos = filas.filter((fila) => Object.values(fila).some((valor) => !esVacio(valor)));
  const columnas = new Set<string>();
  for (const fila of conDatos) {
    for (const [clave, valor] of Object.entries(fila)) {
      if (!esVacio(valor)) columnas.add(clave);
    }
  }
  return conDatos.map((fila) => Object.fromEntries(Object.entries(fila).filter(([clave]) => columnas.has(clave))));
}

export function aplicarModeloTics(filas: readonly ObjetoJson[]): ObjetoJson[] {
  return filas.map((fila) =>
    Object.fromEntries(Object.entries(fila).map(([clave, valor]) => [MAPA_MODELO_TICS[clave] ?? clave, valor]))
  );
}

export function leerPlanilla(ruta: string, opciones: OpcionesConversion = {}): ObjetoJson[] {
  if (!existsSync(ruta)) {
    throw new Error(`No se encontró el archivo: ${ruta}`);
  }

  const filaEncabezado = opciones.filaEncabezado ?? 1;
  if (!Number.isInteger(filaEncabezado) || filaEncabezado < 1) {
    throw new Error(`Fila de encabezados inválida: ${filaEncabezado}`);
  }

  const libro = XLSX.read(readFileSync(ruta), { type: 'buffer' });
  const nombreHoja = opciones.hoja ?? libro.SheetNames[0];
  const hoja = nombreHoja === undefined ? undefined : libro.Sheets[nombreHoja];
  if (!hoja) {
    throw new Error(`La hoja "${nombreHoja ?? ''}" no existe. Hojas: ${libro.SheetNames.join(', ')}`);
  }

  const filas = XLSX.utils.sheet_to_json<ObjetoJson>(hoja, { range: filaEncabezado - 1, defval: null });
  logger.info('Columnas originales: %s', Object.keys(filas[0] ?? {}).join(', '));

  const limpias = descartarVacios(filas);
  return opciones.modeloTics ? aplicarModeloTics(limpias) : limpias;
}

/** Mismo nombre que la planilla, con extensión .json. */
export function rutaJsonPorDefecto(rutaExcel: string): string {
  const { dir, name } = parsePath(rutaExcel);
  return formatPath({ dir, name, ext: '.json' });
}

export function convertirExcelAJson(
  rutaExcel: string,
  rutaSalida: string = rutaJsonPorDefecto(rutaExcel),
  opciones: OpcionesConversion = {}
): { ruta: string; filas: number } {
  logger.info('Leyendo planilla: %s (encabezados en fila %d)', rutaExcel, opciones.filaEncabezado ?? 1);
  const filas = leerPlanilla(rutaExcel, opciones);
  escribirJson(filas, rutaSalida);
  return { ruta: rutaSalida, filas: filas.length };
}
