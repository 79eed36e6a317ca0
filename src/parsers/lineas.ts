import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element, Text } from 'domhandler';
import { limpiarTexto } from '../utils/text.js';

// Contenido que nunca se muestra como texto de la página
const TAGS_SIN_TEXTO = new Set(['script', 'style', 'noscript', 'template']);

function recolectarNodos(nodo: AnyNode, salida: Text[]): void {
  if (isText(nodo)) {
    salida.push(nodo);
    return;
  }
  if (isTag(nodo) && TAGS_SIN_TEXTO.has(nodo.name)) return;
  if (hasChildren(nodo)) {
    for (const hijo of nodo.children) recolectarNodos(hijo, salida);
  }
}

function recolectarTextos(nodo: AnyNode, salida: string[]): void {
  const nodos: Text[] = [];
  recolectarNodos(nodo, nodos);
  for (const texto of nodos) salida.push(texto.data);
}

export function cargarHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Nodos de texto visibles del documento, en orden.
 */
export function nodosDeTexto($: CheerioAPI): Text[] {
  const nodos: Text[] = [];
  for (const nodo of $.root().toArray()) recolectarNodos(nodo, nodos);
  return nodos;
}

/**
 * Cada nodo de texto del documento, recortado y sin vacíos, en orden.
 */
export function cadenasDeTexto($: CheerioAPI): string[] {
  return nodosDeTexto($)
    .map((nodo) => nodo.data.trim())
    .filter((t) => t.length > 0);
}

/**
 * Texto de la página como lista de líneas limpias (un nodo de texto
 * con saltos de línea aporta varias líneas).
 */
export function extraerLineas($: CheerioAPI): string[] {
  return cadenasDeTexto($)
    .flatMap((cadena) => cadena.split(/\r?\n/))
    .map((linea) => linea.trim())
    .filter((linea) => linea.length > 0);
}

/**
 * Texto de un nodo uniendo sus fragmentos con el separador dado.
 */
export function textoDe(nodo: AnyNode, separador = ' '): string {
  const textos: string[] = [];
  recolectarTextos(nodo, textos);
  const unido = textos
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .join(separador);
  return limpiarTexto(unido) ?? '';
}

export function textoPlano($: CheerioAPI): string {
  return cadenasDeTexto($).join(' ');
}

/**
 * Primer elemento posterior a `desde` en orden de documento que cumple el predicado.
 */
export function siguienteEnOrden(
  $: CheerioAPI,
  desde: Element,
  predicado: (el: Element) => boolean
): Element | null {
  const todos = $<Element, '*'>('*').toArray();
  const inicio = todos.indexOf(desde);
  if (inicio === -1) return null;
  return todos.slice(inicio + 1).find(predicado) ?? null;
}

function coincideEtiqueta(linea: string, etiqueta: string | RegExp): boolean {
  if (typeof etiqueta === 'string') {
    return linea.toLowerCase() === etiqueta.toLowerCase();
  }
  return etiqueta.test(linea);
}

/**
 * Busca una línea igual a la etiqueta y devuelve la primera línea
 * siguiente dentro del lookahead. Un encabezado "####" corta la búsqueda
 * para esa ocurrencia.
 */
export function despuesDeEtiqueta(
  lineas: readonly string[],
  etiqueta: string | RegExp,
  lookahead = 6
): string | null {
  for (let i = 0; i < lineas.length; i++) {
    if (!coincideEtiqueta(lineas[i], etiqueta)) continue;

    const fin = Math.min(i + 1 + lookahead, lineas.length);
    for (let j = i + 1; j < fin; j++) {
      const candidato = lineas[j].trim();
      if (!candidato) continue;
      if (candidato.startsWith('####')) break;
      return candidato;
    }
  }
  return null;
}

function escaparRegex(texto: string): string {
  return texto.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Valor de una línea "Etiqueta: Valor".
 */
export function valorConDosPuntos(lineas: readonly string[], etiqueta: string): string | null {
  const regex = new RegExp(`${escaparRegex(etiqueta)}\\s*:\\s*(.+)`, 'i');
  for (const linea of lineas) {
    const match = linea.match(regex);
    if (match) return match[1].trim();
  }
  return null;
}
