import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import type { FilaAlmacen } from './bigquery.js';

const TAMANIO_LOTE = 500;

let supabase: SupabaseClient | null = null;

export function getSupabase(): SupabaseClient {
  if (!supabase) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) {
      throw new Error('Faltan SUPABASE_URL o SUPABASE_SERVICE_KEY en el entorno');
    }
    supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY);
    logger.debug('Cliente Supabase inicializado');
  }
  return supabase;
}

/**
 * Deduplica por doc_id (gana el último) y descarta filas sin ID.
 */
export function filasParaUpsert(filas: readonly FilaAlmacen[]): FilaAlmacen[] {
  const unicas = new Map<string, FilaAlmacen>();
  let sinId = 0;
  for (const fila of filas) {
    if (!fila.doc_id) {
      sinId++;
      continue;
    }
    unicas.set(fila.doc_id, fila);
  }

  if (sinId > 0) logger.warn('%d filas sin doc_id descartadas', sinId);
  const duplicadas = filas.length - sinId - unicas.size;
  if (duplicadas > 0) logger.warn('%d duplicados removidos', duplicadas);

  return Array.from(unicas.values());
}

/**
 * Inserta o actualiza filas en lotes, usando doc_id como clave.
 */
export async function upsertProcesos(
  filas: readonly FilaAlmacen[],
  tabla: string,
  db: SupabaseClient = getSupabase()
): Promise<number> {
  const unicas = filasParaUpsert(filas);
  if (unicas.length === 0) return 0;

  let total = 0;
  for (let i = 0; i < unicas.length; i += TAMANIO_LOTE) {
    const lote = unicas.slice(i, i + TAMANIO_LOTE);
    const { data, error } = await db.from(tabla).upsert(lote, { onConflict: 'doc_id' }).select('doc_id');

    if (error) {
      throw new Error(`Error al hacer upsert en ${tabla}: ${error.message}`);
    }
    total += data?.length ?? 0;
  }

  logger.info('%d procesos upserted en %s (de %d únicos)', total, tabla, unicas.length);
  return total;
}
