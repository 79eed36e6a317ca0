import type { ScraperConfig } from '../config/scraper-config.js';
import { extraerCamposConvocatoria } from '../parsers/convocatoria.js';
import { parsearPagina } from '../parsers/estrategias.js';
import { cargarHtml } from '../parsers/lineas.js';
import { esPaginaDeListado, leerEstadoFormulario } from '../parsers/listado-comprar.js';
import { extraerBloqueRenglones } from '../parsers/renglones.js';
import type { DetalleConvocatoria, EnlaceDetalle, PaginaHtml } from '../types/index.js';
import { guardarHtml } from '../utils/debug-html.js';
import { logger } from '../utils/logger.js';
import { sanitizarDocId } from '../utils/text.js';
import type { SesionHttp } from './http.js';

/**
 * Documento descargado del pliego, o null si no se pudo obtener.
 */
export interface DocumentoPliego {
  contentType: string;
  html: string;
}

export type CargadorPliego = (url: string) => Promise<DocumentoPliego | null>;

function esBinario(contentType: string): boolean {
  return contentType.includes('pdf') || contentType.includes('octet-stream');
}

/**
 * Si la Vista Previa no trae renglones, los busca en la página del pliego.
 */
export async function completarDesdePliego(
  detalle: DetalleConvocatoria,
  cargarPliego: CargadorPliego
): Promise<DetalleConvocatoria> {
  if (detalle.detalle_productos || !detalle.pliego_url) return detalle;

  logger.debug('Buscando renglones en pliego: %s', detalle.pliego_url);
  const documento = await cargarPliego(detalle.pliego_url);
  if (!documento) return detalle;

  if (esBinario(documento.contentType)) {
    logger.debug('El pliego es un binario (%s), sin renglones', documento.contentType);
    return detalle;
  }

  const renglones = extraerBloqueRenglones(parsearPagina(documento.html, detalle.pliego_url).lineas);
  return renglones ? { ...detalle, detalle_productos: renglones } : detalle;
}

/**
 * Cargador de pliegos sobre la sesión HTTP. Un error de red deja el
 * detalle sin renglones, no corta la fila.
 */
export function cargadorPliegoHttp(sesion: SesionHttp): CargadorPliego {
  return async (url) => {
    try {
      const respuesta = await sesion.get(url);
      return { contentType: respuesta.contentType, html: respuesta.html };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn({ err, url }, 'No se pudo descargar el pliego');
      return null;
    }
  };
}

export function extraerDetalle(html: string, url: string, config: ScraperConfig): DetalleConvocatoria {
  return extraerCamposConvocatoria(parsearPagina(html, url), config.comprarBaseUrl);
}

/**
 * Detalle por URL directa (Vista Previa).
 */
export async function obtenerDetallePorUrl(
  sesion: SesionHttp,
  url: string,
  config: ScraperConfig
): Promise<DetalleConvocatoria> {
  const respuesta = await sesion.get(url);
  guardarHtml(config, `detalle_${url.split('/').pop() ?? 'sin-nombre'}`, respuesta.html);
  const detalle = extraerDetalle(respuesta.html, respuesta.url, config);
  return completarDesdePliego(detalle, cargadorPliegoHttp(sesion));
}

/**
 * Repite el postback del link del listado. Si la respuesta sigue siendo
 * el listado, el detalle no está disponible.
 */
export async function obtenerDetallePorPostback(
  sesion: SesionHttp,
  pagina: PaginaHtml,
  target: string,
  argumento: string,
  config: ScraperConfig
): Promise<DetalleConvocatoria | null> {
  const datos: Record<string, string> = {
    ...leerEstadoFormulario(cargarHtml(pagina.html)),
    __EVENTTARGET: target,
    __EVENTARGUMENT: argumento,
    __LASTFOCUS: '',
  };

  const respuesta = await sesion.postFormulario(pagina.url, datos);
  const $ = cargarHtml(respuesta.html);
  if (esPaginaDeListado($, respuesta.html)) {
    logger.warn({ target }, 'El postback no abrió el detalle, seguimos en el listado');
    return null;
  }

  guardarHtml(config, `detalle_postback_${sanitizarDocId(target)}`, respuesta.html);
  const detalle = extraerDetalle(respuesta.html, respuesta.url, config);
  return completarDesdePliego(detalle, cargadorPliegoHttp(sesion));
}

/**
 * Resuelve el descriptor de enlace de una fila contra la sesión HTTP.
 */
export async function resolverDetalle(
  sesion: SesionHttp,
  enlace: EnlaceDetalle | null,
  pagina: PaginaHtml,
  config: ScraperConfig
): Promise<DetalleConvocatoria | null> {
  if (!enlace) return null;

  switch (enlace.tipo) {
    case 'url':
      return obtenerDetallePorUrl(sesion, enlace.url, config);
    case 'postback':
      return obtenerDetallePorPostback(sesion, pagina, enlace.target, enlace.argumento, config);
  }
}
