import type { Estrategia, PaginaParseada } from './estrategias.js';
import { textoDe } from './lineas.js';
import { normalizarComparacion } from '../utils/text.js';

// Encabezados que abren el bloque de renglones (comparados sin acentos, en minúsculas)
export const ENCABEZADOS_RENGLONES = [
  'detalle de productos o servicios',
  'detalle de bienes y servicios',
  'detalle de bienes o servicios',
  'renglones de la convocatoria',
  'renglones convocatoria',
] as const;

// Palabras de encabezado que identifican una tabla de renglones
export const COLUMNAS_RENGLONES = [
  'numero de renglon',
  'objeto del gasto',
  'descripcion del bien',
  'detalle del bien',
  'detalle del producto',
] as const;

const SEPARADOR_LINEAS = ' | ';
const SEPARADOR_FILAS = '; ';

function esFinDeBloque(linea: string): boolean {
  return linea.startsWith('#### ') || linea === '×';
}

/**
 * Bloque de renglones por texto: desde el encabezado hasta el próximo
 * "#### " o el "×" que cierra el modal.
 */
export function extraerBloqueRenglones(lineas: readonly string[]): string | null {
  const inicio = lineas.findIndex((linea) => {
    const normalizada = normalizarComparacion(linea);
    return ENCABEZADOS_RENGLONES.some((encabezado) => normalizada.includes(encabezado));
  });
  if (inicio === -1) return null;

  const detalle: string[] = [];
  for (const linea of lineas.slice(inicio + 1)) {
    const texto = linea.trim();
    if (!texto) continue;
    if (esFinDeBloque(texto)) break;
    detalle.push(texto);
  }

  return detalle.length > 0 ? detalle.join(SEPARADOR_LINEAS) : null;
}

/**
 * Fallback por tablas: cada fila con sus celdas unidas por " | ",
 * filas unidas por "; ".
 */
export function extraerRenglonesDeTablas(pagina: PaginaParseada): string | null {
  const { $ } = pagina;
  const partes: string[] = [];

  $('table').each((_, tabla) => {
    const filas = $(tabla).find('tr').toArray();
    const encabezado = filas[0];
    if (!encabezado) return;

    const textoEncabezado = normalizarComparacion(
      $(encabezado)
        .find('th, td')
        .toArray()
        .map((celda) => textoDe(celda))
        .join(' ')
    );
    if (!COLUMNAS_RENGLONES.some((columna) => textoEncabezado.includes(columna))) return;

    for (const fila of filas.slice(1)) {
      const celdas = $(fila)
        .find('td, th')
        .toArray()
        .map((celda) => textoDe(celda))
        .filter((texto) => texto.length > 0);
      if (celdas.length > 0) partes.push(celdas.join(SEPARADOR_LINEAS));
    }
  });

  return partes.length > 0 ? partes.join(SEPARADOR_FILAS) : null;
}

export const bloqueDeRenglones: Estrategia = (pagina) => extraerBloqueRenglones(pagina.lineas);

export const tablaDeRenglones: Estrategia = extraerRenglonesDeTablas;
