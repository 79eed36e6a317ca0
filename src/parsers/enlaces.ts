import type { EnlaceDetalle } from '../types/index.js';

const REGEX_POSTBACK = /__doPostBack\('([^']*)','([^']*)'\)/;

/**
 * Convierte el href de una fila del listado en una URL de detalle absoluta.
 * Los "javascript:" solo sirven si llevan una URL o una ruta VistaPrevia adentro.
 */
export function normalizarUrlDetalle(href: string | null | undefined, baseUrl: string): string | null {
  if (!href) return null;
  const limpio = href.trim();
  if (!limpio) return null;

  if (limpio.toLowerCase().startsWith('javascript:')) {
    const absoluta = limpio.match(/(https?:\/\/[^'";]+)/i);
    if (absoluta) return absoluta[1];

    const pliego = limpio.match(/['"](\/?PLIEGO\/VistaPrevia[^'";]+)['"]/i);
    if (pliego) return new URL(pliego[1], baseUrl).toString();

    const vistaPrevia = limpio.match(/['"](\/?[^'";]*VistaPrevia[^'";]+)['"]/i);
    if (vistaPrevia) return new URL(vistaPrevia[1], baseUrl).toString();

    return null;
  }

  if (limpio.startsWith('http://') || limpio.startsWith('https://')) {
    return limpio;
  }

  // Rutas ASP.NET del tipo "~/PLIEGO/..."
  return new URL(limpio.replace(/^~+/, ''), baseUrl).toString();
}

/**
 * javascript:__doPostBack('ctl00$CPH1$Grid$ctl03$lnkNumeroProceso','') → descriptor de postback
 */
export function parsearPostback(href: string | null | undefined): { target: string; argumento: string } | null {
  if (!href) return null;
  const match = href.trim().match(REGEX_POSTBACK);
  if (!match) return null;
  return { target: match[1], argumento: match[2] };
}

/**
 * Descriptor de enlace de una fila: postback primero, luego URL resoluble.
 */
export function resolverEnlace(href: string | null | undefined, baseUrl: string): EnlaceDetalle | null {
  const postback = parsearPostback(href);
  if (postback) return { tipo: 'postback', ...postback };

  const url = normalizarUrlDetalle(href, baseUrl);
  return url ? { tipo: 'url', url } : null;
}
