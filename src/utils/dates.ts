import { addDays, differenceInCalendarDays, format, isValid, parse, startOfDay } from 'date-fns';

/**
 * Parse de fecha "dd/MM/yyyy" (formato de la línea de comandos).
 */
export function parseFechaCli(fechaStr: string): Date | null {
  const parsed = parse(fechaStr.trim(), 'dd/MM/yyyy', new Date());
  return isValid(parsed) ? parsed : null;
}

/** yyyyMMdd, usado en nombres de archivo y en la URL de la sección tercera. */
export function fechaCompacta(fecha: Date): string {
  return format(fecha, 'yyyyMMdd');
}

export function fechaIso(fecha: Date): string {
  return format(fecha, 'yyyy-MM-dd');
}

/**
 * Días de desde a hasta, ambos incluidos.
 */
export function diasDelRango(desde: Date, hasta: Date): Date[] {
  const inicio = startOfDay(desde);
  const total = differenceInCalendarDays(startOfDay(hasta), inicio);
  if (total < 0) {
    throw new Error(`Rango de fechas inválido: ${fechaIso(desde)} es posterior a ${fechaIso(hasta)}`);
  }
  return Array.from({ length: total + 1 }, (_, i) => addDays(inicio, i));
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay aleatorio para simular comportamiento humano.
 */
export function randomDelay(minMs: number, maxMs: number): Promise<void> {
  const delay = Math.floor(Math.random() * (maxMs - minMs + 1)) + minMs;
  return sleep(delay);
}
