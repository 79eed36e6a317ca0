import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import type { DetalleConvocatoria, PliegoInfo } from '../types/index.js';
import { dosPuntos, etiqueta, primeraCoincidencia } from './estrategias.js';
import type { Estrategia, PaginaParseada } from './estrategias.js';
import { despuesDeEtiqueta, nodosDeTexto, siguienteEnOrden, textoDe, textoPlano } from './lineas.js';
import { bloqueDeRenglones, tablaDeRenglones } from './renglones.js';
import { normalizarComparacion } from '../utils/text.js';

type CampoTexto = Exclude<keyof DetalleConvocatoria, 'url' | 'pliego_nombre' | 'pliego_url'>;

/**
 * Orden de estrategias por campo de la Vista Previa de una convocatoria.
 */
export const ESTRATEGIAS_CONVOCATORIA: Record<CampoTexto, readonly Estrategia[]> = {
  numero_proceso: [etiqueta('Número de Procedimiento')],
  expediente: [etiqueta('Número de Expediente')],
  nombre_proceso: [etiqueta('Objeto')],
  tipo_proceso: [etiqueta('Tipo de Procedimiento')],
  fecha_apertura: [dosPuntos('Fecha de apertura'), etiqueta('Fecha de apertura')],
  estado: [dosPuntos('Estado'), etiqueta('Estado')],
  unidad_ejecutora: [etiqueta('Unidad Operativa de Contrataciones')],
  saf: [etiqueta('Servicio Administrativo Financiero')],
  detalle_productos: [bloqueDeRenglones, tablaDeRenglones],
};

const REGEX_PLIEGO_GDE = /(PLIEG-\d{4,}-[A-Z0-9#-]+)/;

function tablaDeAnexos($: CheerioAPI): Element | null {
  const titulo = nodosDeTexto($).find((nodo) => /Anexos/i.test(nodo.data));
  const contenedor = titulo?.parent;
  if (contenedor && isTag(contenedor)) {
    const tabla = siguienteEnOrden($, contenedor, (el) => el.name === 'table');
    if (tabla) return tabla;
  }

  // Sin sección "Anexos": tabla con columnas nombre + tipo/anexo
  for (const tabla of $('table').toArray()) {
    const encabezado = $(tabla).find('tr').first();
    if (encabezado.length === 0) continue;
    const texto = encabezado
      .find('th, td')
      .toArray()
      .map((celda) => textoDe(celda).toLowerCase())
      .join(' ');
    if (texto.includes('nombre') && (texto.includes('tipo') || texto.includes('anexo'))) {
      return tabla;
    }
  }
  return null;
}

function mencionaPliego(texto: string): boolean {
  return normalizarComparacion(texto).includes('pliego');
}

function absoluta(href: string, baseUrl: string): string {
  return href.startsWith('http') ? href : new URL(href, baseUrl).toString();
}

/**
 * Pliego de la sección Anexos: prioriza la fila cuyo nombre dice "Pliego",
 * luego cualquier columna que lo mencione, y por último el primer link.
 */
export function extraerPliegoInfo($: CheerioAPI, baseUrl: string): PliegoInfo {
  const tabla = tablaDeAnexos($);
  if (!tabla) return { pliego_nombre: null, pliego_url: null };

  const filas = $(tabla)
    .find('tr')
    .toArray()
    .slice(1)
    .map((tr) => {
      const celdas = $(tr).find('td, th').toArray().map((celda) => textoDe(celda));
      const link = $(tr).find('a[href]').first();
      return {
        celdas,
        href: link.attr('href') ?? null,
        textoLink: link.length > 0 ? textoDe(link[0]) : '',
      };
    })
    .filter((fila) => fila.celdas.length > 0 || fila.href);

  const porNombre = filas.find((f) => f.href && f.celdas[0] && mencionaPliego(f.celdas[0]));
  if (porNombre?.href) {
    return { pliego_nombre: porNombre.celdas[0], pliego_url: absoluta(porNombre.href, baseUrl) };
  }

  const porColumna = filas.find((f) => f.href && mencionaPliego(f.celdas.join(' ')));
  if (porColumna?.href) {
    return {
      pliego_nombre: porColumna.celdas[0] || null,
      pliego_url: absoluta(porColumna.href, baseUrl),
    };
  }

  const primerLink = filas.find((f) => f.href);
  if (primerLink?.href) {
    return { pliego_nombre: primerLink.textoLink || null, pliego_url: absoluta(primerLink.href, baseUrl) };
  }

  return { pliego_nombre: null, pliego_url: null };
}

/**
 * "Número GDE" del pliego: patrón PLIEG-... en el texto, o la etiqueta.
 */
export function extraerNumeroGde(pagina: PaginaParseada): string | null {
  const match = textoPlano(pagina.$).match(REGEX_PLIEGO_GDE);
  if (match) return match[1];
  return despuesDeEtiqueta(pagina.lineas, 'Número GDE');
}

/**
 * Campos de la Vista Previa. El detalle de productos puede quedar vacío;
 * completarlo desde el pliego es responsabilidad de quien hace el fetch.
 */
export function extraerCamposConvocatoria(pagina: PaginaParseada, baseUrl: string): DetalleConvocatoria {
  const campo = (nombre: CampoTexto) => primeraCoincidencia(pagina, ESTRATEGIAS_CONVOCATORIA[nombre]);

  return {
    numero_proceso: campo('numero_proceso'),
    expediente: campo('expediente'),
    nombre_proceso: campo('nombre_proceso'),
    tipo_proceso: campo('tipo_proceso'),
    fecha_apertura: campo('fecha_apertura'),
    estado: campo('estado'),
    unidad_ejecutora: campo('unidad_ejecutora'),
    saf: campo('saf'),
    detalle_productos: campo('detalle_productos'),
    ...extraerPliegoInfo(pagina.$, baseUrl),
    url: pagina.url,
  };
}
