import { normalizarComparacion } from '../utils/text.js';

/**
 * Marca si el texto parece describir una compra TIC. Solo informativo:
 * nunca se usa para filtrar registros.
 */
export function esTic(texto: string | null | undefined, palabras: readonly string[]): boolean {
  if (!texto) return false;
  const normalizado = normalizarComparacion(texto);

  return palabras.some((palabra) => {
    const clave = normalizarComparacion(palabra);
    // Claves muy cortas ("pc", "ti") dan falsos positivos
    if (clave.length <= 2) return false;
    return normalizado.includes(clave);
  });
}

/**
 * Texto que se clasifica: nombre del proceso + detalle de productos.
 */
export function textoParaClasificar(registro: {
  nombre_proceso: string | null;
  detalle_productos: string | null;
}): string {
  return [registro.nombre_proceso, registro.detalle_productos].filter(Boolean).join(' ');
}
