import type { CheerioAPI } from 'cheerio';
import { cargarHtml } from '../parsers/lineas.js';
import {
  extraerFilasListado,
  leerEnlacesPaginas,
  leerObjetivoPaginador,
  leerTotalResultados,
} from '../parsers/listado-comprar.js';
import type { CancelPredicate, FilaListado, PaginaHtml } from '../types/index.js';
import { sleep } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

/**
 * Cómo se obtienen las páginas del listado: requests directos o un
 * navegador que hace click en el paginador.
 */
export interface NavegadorListado {
  abrir(): Promise<PaginaHtml>;
  abrirEnlace(url: string): Promise<PaginaHtml>;
  postback(desde: PaginaHtml, target: string, argumento: string): Promise<PaginaHtml>;
}

export interface OpcionesRecorrido {
  baseUrl: string;
  maxPaginas?: number | null;
  delayMs?: number;
  isCancelled?: CancelPredicate;
}

export interface PaginaListado {
  numero: number;
  pagina: PaginaHtml;
  filas: FilaListado[];
  // Filas que se espera recorrer en total, si el sitio informa la cantidad
  filasEsperadas: number | null;
}

function tienePaginaSiguiente($: CheerioAPI, target: string, numero: number): boolean {
  return $('a[href]')
    .toArray()
    .some((a) => {
      const href = $(a).attr('href') ?? '';
      return href.includes(target) && href.includes(`'Page$${numero}'`);
    });
}

/**
 * Recorre el listado página por página. Primero intenta links numéricos
 * simples; si no hay, pagina por postback (Page$2, Page$3, ...).
 */
export async function* recorrerListado(
  navegador: NavegadorListado,
  opciones: OpcionesRecorrido
): AsyncGenerator<PaginaListado> {
  const { baseUrl, maxPaginas = null, delayMs = 0, isCancelled } = opciones;
  const cancelado = () => isCancelled?.() ?? false;
  const dentroDelLimite = (numero: number) => maxPaginas === null || numero <= maxPaginas;

  if (cancelado()) return;

  const primera = await navegador.abrir();
  const $primera = cargarHtml(primera.html);
  const filasPrimera = extraerFilasListado($primera, baseUrl);
  const total = leerTotalResultados($primera);
  const tamPagina = filasPrimera.length;

  let paginasEsperadas: number | null = null;
  if (total !== null && tamPagina > 0) {
    paginasEsperadas = Math.ceil(total / tamPagina);
  }

  let filasEsperadas: number | null = total;
  if (total !== null && maxPaginas !== null && tamPagina > 0) {
    filasEsperadas = Math.min(total, tamPagina * maxPaginas);
  }

  logger.info(
    'Listado: %s resultados, %d filas por página, %s páginas',
    total ?? 'N/A',
    tamPagina,
    paginasEsperadas ?? 'N/A'
  );

  yield { numero: 1, pagina: primera, filas: filasPrimera, filasEsperadas };
  if (tamPagina === 0) return;

  // Una página cuya primera fila ya apareció es una que ya recorrimos
  const yaVistas = new Set(filasPrimera.map((f) => f.numero_proceso));
  const repetida = (filas: readonly FilaListado[]) => filas.length > 0 && yaVistas.has(filas[0].numero_proceso);
  const marcar = (filas: readonly FilaListado[]) => filas.forEach((f) => yaVistas.add(f.numero_proceso));

  // Paginación por links simples
  const enlaces = leerEnlacesPaginas($primera, baseUrl);
  if (enlaces.length > 0) {
    let numero = 2;
    for (const url of enlaces) {
      if (!dentroDelLimite(numero) || cancelado()) return;
      await sleep(delayMs);
      const pagina = await navegador.abrirEnlace(url);
      const filas = extraerFilasListado(cargarHtml(pagina.html), baseUrl);
      if (repetida(filas)) {
        logger.debug('El link %s repite una página ya recorrida, se saltea', url);
        continue;
      }
      marcar(filas);
      yield { numero, pagina, filas, filasEsperadas };
      numero++;
    }
    return;
  }

  // Paginación por __doPostBack
  const target = leerObjetivoPaginador($primera);
  if (!target) return;

  let actual = primera;
  let $actual = $primera;
  for (let numero = 2; ; numero++) {
    if (paginasEsperadas !== null ? numero > paginasEsperadas : !tienePaginaSiguiente($actual, target, numero)) {
      return;
    }
    if (!dentroDelLimite(numero) || cancelado()) return;

    await sleep(delayMs);
    actual = await navegador.postback(actual, target, `Page$${numero}`);
    $actual = cargarHtml(actual.html);
    const filas = extraerFilasListado($actual, baseUrl);
    if (filas.length === 0) {
      logger.warn('Página %d del listado sin filas, fin del recorrido', numero);
      return;
    }
    if (repetida(filas)) {
      logger.warn('Página %d repite filas ya vistas, fin del recorrido', numero);
      return;
    }
    marcar(filas);
    yield { numero, pagina: actual, filas, filasEsperadas };
  }
}
