/**
 * Colapsa espacios (incluye &nbsp;) y recorta. Cadena vacía → null.
 */
export function limpiarTexto(texto: string | null | undefined): string | null {
  if (texto == null) return null;
  const limpio = texto.replace(/\s+/g, ' ').trim();
  return limpio.length > 0 ? limpio : null;
}

export function quitarAcentos(texto: string): string {
  return texto.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Normaliza para comparar: sin acentos y en minúsculas.
 */
export function normalizarComparacion(texto: string): string {
  return quitarAcentos(texto).toLowerCase();
}

/**
 * Convierte un número de proceso en un ID de documento válido.
 * Ej: "14/1-0026 LPR25" → "14-1-0026_LPR25"
 */
export function sanitizarDocId(valor: string): string {
  return valor.trim().replace(/[/\\]/g, '-').replace(/\s+/g, '_');
}

/**
 * Primer grupo de 4 dígitos del texto (ej: "18/07/2025 10:30 Hrs." → 2025).
 */
export function extraerAnio(texto: string | null | undefined): number | null {
  if (!texto) return null;
  const match = texto.match(/(\d{4})/);
  return match ? parseInt(match[1], 10) : null;
}
