import { scrapeBoletinTercera } from './boletin-tercera.js';
import { scrapeComprarTics, scrapeComprarTicsRobot } from './comprar.js';
import type { AdapterFuente } from './pipeline.js';

export const FUENTES = {
  boletin_tercera: scrapeBoletinTercera,
  comprar_tics: scrapeComprarTics,
  comprar_tics_robot: scrapeComprarTicsRobot,
} satisfies Record<string, AdapterFuente>;

export type ClaveFuente = keyof typeof FUENTES;

export const CLAVES_FUENTES = ['boletin_tercera', 'comprar_tics', 'comprar_tics_robot'] as const satisfies readonly ClaveFuente[];

export function esClaveFuente(clave: string): clave is ClaveFuente {
  return CLAVES_FUENTES.some((c) => c === clave);
}

export function obtenerAdapter(clave: string): AdapterFuente {
  if (!esClaveFuente(clave)) {
    throw new Error(`Fuente desconocida: ${clave}. Claves válidas: ${CLAVES_FUENTES.join(', ')}`);
  }
  return FUENTES[clave];
}
