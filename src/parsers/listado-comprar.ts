import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { SELECTORS } from '../types/index.js';
import type { FilaListado } from '../types/index.js';
import { resolverEnlace } from './enlaces.js';
import { textoDe, textoPlano } from './lineas.js';

/**
 * Tabla principal de resultados ("Ver todos").
 */
export function encontrarGrilla($: CheerioAPI): Element | null {
  for (const tabla of $('table').toArray()) {
    const encabezado = $(tabla).find('tr').first();
    if (encabezado.length === 0) continue;
    const texto = encabezado
      .find('th, td')
      .toArray()
      .map((celda) => textoDe(celda))
      .join(' ');
    if (SELECTORS.comprar.encabezadosGrilla.every((h) => texto.includes(h))) {
      return tabla;
    }
  }
  return null;
}

/**
 * Filas de la grilla. Descarta la fila del paginador (primera celda sin letras).
 */
export function extraerFilasListado($: CheerioAPI, baseUrl: string): FilaListado[] {
  const grilla = encontrarGrilla($);
  if (!grilla) return [];

  const filas: FilaListado[] = [];
  for (const tr of $(grilla).find('tr').toArray().slice(1)) {
    const celdas = $(tr).find('td').toArray().map((td) => textoDe(td));
    if (celdas.length < 4) continue;

    const numero = celdas[0];
    if (!numero || !/\p{L}/u.test(numero)) continue;

    const celda = (i: number): string | null => celdas[i] || null;
    const href = $(tr).find('a[href]').first().attr('href');

    filas.push({
      numero_proceso: numero,
      nombre_proceso: celda(1),
      tipo_proceso: celda(2),
      fecha_apertura: celda(3),
      estado: celda(4),
      unidad_ejecutora: celda(5),
      saf: celda(6),
      enlace: resolverEnlace(href, baseUrl),
    });
  }
  return filas;
}

/**
 * "Se han encontrado (N) resultados" → N
 */
export function leerTotalResultados($: CheerioAPI): number | null {
  const match = textoPlano($).match(/Se han encontrado\s*\((\d+)\)\s*resultados/);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Inputs hidden del formulario (__VIEWSTATE, __EVENTVALIDATION, ...).
 */
export function leerEstadoFormulario($: CheerioAPI): Record<string, string> {
  const estado: Record<string, string> = {};
  $('form')
    .first()
    .find('input[type="hidden"]')
    .each((_, input) => {
      const nombre = $(input).attr('name');
      if (!nombre) return;
      estado[nombre] = $(input).attr('value') ?? '';
    });
  return estado;
}

/**
 * Control que recibe los postbacks de paginación: __doPostBack('GRID','Page$2') → GRID
 */
export function leerObjetivoPaginador($: CheerioAPI): string | null {
  for (const a of $('a[href]').toArray()) {
    const match = ($(a).attr('href') ?? '').match(/__doPostBack\('([^']+)',\s*'Page\$\d+'\)/);
    if (match) return match[1];
  }
  return null;
}

/**
 * Links numéricos directos a otras páginas de Compras.aspx, sin duplicados.
 */
export function leerEnlacesPaginas($: CheerioAPI, baseUrl: string): string[] {
  const enlaces = new Set<string>();
  for (const a of $('a[href]').toArray()) {
    const texto = $(a).text().trim();
    const href = $(a).attr('href') ?? '';
    if (!/^\d+$/.test(texto) || !href.includes('Compras.aspx')) continue;
    enlaces.add(new URL(href, baseUrl).toString());
  }
  return [...enlaces];
}

/**
 * Si la respuesta sigue mostrando la grilla, el postback no abrió el detalle.
 */
export function esPaginaDeListado($: CheerioAPI, html: string): boolean {
  return html.includes(SELECTORS.comprar.marcadorGrilla) || encontrarGrilla($) !== null;
}
