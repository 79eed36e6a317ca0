import type { CheerioAPI } from 'cheerio';
import type { AvisoBoletin, DetalleAviso } from '../types/index.js';
import { SELECTORS } from '../types/index.js';
import { cadenasDeTexto, nodosDeTexto, siguienteEnOrden, textoDe } from './lineas.js';
import { limpiarTexto } from '../utils/text.js';

const FECHA_PUBLICACION = 'Fecha de publicación';
const COMPARTIR = 'Compartir por email';

const REGEX_OBJETO = /(Objeto(?: de la contrataci[oó]n)?|Objeto de la licitaci[oó]n|Asunto)\s*:?/i;

// Frases donde termina la descripción del objeto (se comparan en minúsculas)
const CORTES_OBJETO = [
  'Retiro del Pliego',
  'Presentación de Ofertas',
  'Presentacion de Ofertas',
  'Consulta del Pliego',
  'Plazo y horario',
  'VALOR DEL PLIEGO',
  'Dirección institucional de correo electrónico',
  'DIRECCION INSTITUCIONAL DE CORREO ELECTRONICO',
  'LUGAR DE CONSULTAS',
  'FECHA Y HORA ACTO DE APERTURA',
  FECHA_PUBLICACION,
  COMPARTIR,
].map((corte) => corte.toLowerCase());

/**
 * Avisos de la sección tercera de una edición, sin URLs repetidas.
 */
export function extraerAvisos($: CheerioAPI, fechaEdicion: string, baseUrl: string): AvisoBoletin[] {
  const vistos = new Set<string>();
  const avisos: AvisoBoletin[] = [];

  for (const a of $('a[href]').toArray()) {
    const href = $(a).attr('href') ?? '';
    if (!href.includes(SELECTORS.boletin.enlaceAviso)) continue;

    const url = href.startsWith('http') ? href : `${baseUrl}${href}`;
    if (vistos.has(url)) continue;
    vistos.add(url);

    avisos.push({
      titulo_listado: textoDe(a, ''),
      url,
      fecha_edicion: fechaEdicion,
    });
  }
  return avisos;
}

/**
 * Solo el texto del Objeto/Asunto, sin plazos ni datos de retiro del pliego.
 */
export function extraerResumenObjeto(texto: string | null): string | null {
  const normalizado = limpiarTexto(texto);
  if (!normalizado) return null;

  const match = REGEX_OBJETO.exec(normalizado);
  if (!match) return null;

  const resto = normalizado.slice(match.index + match[0].length).trim();
  const restoMinusculas = resto.toLowerCase();

  let corte = resto.length;
  for (const frase of CORTES_OBJETO) {
    const pos = restoMinusculas.indexOf(frase);
    if (pos !== -1 && pos < corte) corte = pos;
  }

  const resumen = resto.slice(0, corte).replace(/^[ .\-;:]+|[ .\-;:]+$/g, '');
  return resumen || null;
}

/**
 * Detalle de un aviso: organismo (h1), proceso (h2), bloque descriptivo,
 * objeto y fecha de publicación.
 */
export function parsearAviso($: CheerioAPI, url: string): DetalleAviso {
  const h1 = $('h1').first()[0] ?? null;
  const organismo = h1 ? textoDe(h1, '') || null : null;

  const h2 = h1 ? siguienteEnOrden($, h1, (el) => el.name === 'h2') : ($('h2').first()[0] ?? null);
  const proceso = h2 ? textoDe(h2, '') || null : null;

  let resumen: string | null = null;

  const cadenas = cadenasDeTexto($);
  const indiceProceso = proceso ? cadenas.indexOf(proceso) : -1;
  if (indiceProceso !== -1) {
    const partes: string[] = [];
    for (const cadena of cadenas.slice(indiceProceso + 1)) {
      if (cadena.includes(FECHA_PUBLICACION) || cadena.includes(COMPARTIR)) break;
      partes.push(cadena);
    }
    if (partes.length > 0) resumen = partes.join(' ').trim();
  }

  if (resumen === null && h2) {
    const bloque = siguienteEnOrden($, h2, (el) => el.name === 'p' || el.name === 'div');
    if (bloque) resumen = textoDe(bloque);
  }

  let fechaPublicacion: string | null = null;
  const nodoFecha = nodosDeTexto($).find((nodo) => nodo.data.includes(FECHA_PUBLICACION));
  if (nodoFecha?.parent) {
    fechaPublicacion = textoDe(nodoFecha.parent).replaceAll(FECHA_PUBLICACION, '').trim();
  }

  return {
    organismo,
    proceso,
    fecha_publicacion: fechaPublicacion,
    resumen_proyecto: resumen,
    objeto_resumen: extraerResumenObjeto(resumen),
    url,
  };
}
