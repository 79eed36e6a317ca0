import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

export type ObjetoJson = Record<string, unknown>;

const listaDeObjetos = z.array(z.record(z.unknown()));

/**
 * Vacíos ("" o undefined) pasan a null en el archivo.
 */
export function normalizarVacios<T extends object>(registro: T): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(registro).map(([clave, valor]) => [clave, valor === undefined || valor === '' ? null : valor])
  );
}

export function escribirJson(registros: readonly object[], ruta: string): string {
  mkdirSync(dirname(ruta), { recursive: true });
  const contenido = registros.map((r) => normalizarVacios(r));
  writeFileSync(ruta, JSON.stringify(contenido, null, 2), 'utf-8');
  logger.info('Guardados %d registros en %s', registros.length, ruta);
  return ruta;
}

/**
 * Lee un JSON que debe ser una lista de objetos.
 */
export function leerJsonRegistros(ruta: string): ObjetoJson[] {
  let crudo: unknown;
  try {
    crudo = JSON.parse(readFileSync(ruta, 'utf-8'));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new Error(`No se pudo leer el JSON ${ruta}: ${err.message}`);
  }

  const resultado = listaDeObjetos.safeParse(crudo);
  if (!resultado.success) {
    throw new Error(`El JSON ${ruta} debe ser una lista de objetos`);
  }
  return resultado.data;
}
