import type { CheerioAPI } from 'cheerio';
import { cargarHtml, despuesDeEtiqueta, extraerLineas, valorConDosPuntos } from './lineas.js';

/**
 * Página ya parseada: DOM, líneas de texto y URL de origen.
 */
export interface PaginaParseada {
  $: CheerioAPI;
  lineas: string[];
  url: string;
}

/** Estrategia pura de extracción de un campo. */
export type Estrategia = (pagina: PaginaParseada) => string | null;

export function parsearPagina(html: string, url: string): PaginaParseada {
  const $ = cargarHtml(html);
  return { $, lineas: extraerLineas($), url };
}

/**
 * Prueba las estrategias en orden; gana el primer valor no vacío.
 */
export function primeraCoincidencia(
  pagina: PaginaParseada,
  estrategias: readonly Estrategia[]
): string | null {
  for (const estrategia of estrategias) {
    const valor = estrategia(pagina);
    if (valor) return valor;
  }
  return null;
}

export const etiqueta =
  (label: string | RegExp, lookahead = 6): Estrategia =>
  (pagina) =>
    despuesDeEtiqueta(pagina.lineas, label, lookahead);

export const dosPuntos =
  (label: string): Estrategia =>
  (pagina) =>
    valorConDosPuntos(pagina.lineas, label);
