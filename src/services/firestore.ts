import { FieldValue, Firestore } from '@google-cloud/firestore';
import { logger } from '../utils/logger.js';
import { extraerAnio, sanitizarDocId } from '../utils/text.js';
import { verificarCredenciales } from './bigquery.js';
import type { ObjetoJson } from './export-json.js';

export interface DestinoFirestore {
  collection: string;
  projectId?: string;
  credentials?: string;
}

/**
 * ID del documento: el campo indicado sanitizado, o doc_<n> (n desde 1) si falta.
 */
export function idDocumento(rec: ObjetoJson, idField: string, indice: number): string {
  const base = rec[idField];
  if (base === undefined || base === null || base === '') return `doc_${indice + 1}`;
  return sanitizarDocId(String(base));
}

/**
 * Copia del registro con "anio" derivado de fecha_apertura si no venía.
 */
export function prepararDocumento(rec: ObjetoJson): ObjetoJson {
  const data: ObjetoJson = { ...rec };
  if (!('anio' in data) && typeof data.fecha_apertura === 'string') {
    const anio = extraerAnio(data.fecha_apertura);
    if (anio !== null) data.anio = anio;
  }
  return data;
}

export function crearClienteFirestore(projectId?: string, credentials?: string): Firestore {
  verificarCredenciales(credentials);
  if (credentials) logger.info('Usando credenciales: %s', credentials);
  else logger.info('Usando credenciales por defecto (GOOGLE_APPLICATION_CREDENTIALS o gcloud)');

  return new Firestore({
    ...(projectId ? { projectId } : {}),
    ...(credentials ? { keyFilename: credentials } : {}),
  });
}

/**
 * Un set() por registro; documentos existentes se reemplazan.
 */
export async function subirAFirestore(
  registros: readonly ObjetoJson[],
  destino: DestinoFirestore,
  idField = 'numero_proceso'
): Promise<number> {
  const db = crearClienteFirestore(destino.projectId, destino.credentials);
  const coleccion = db.collection(destino.collection);
  logger.info('Colección destino: %s', destino.collection);

  let subidos = 0;
  for (const [indice, rec] of registros.entries()) {
    const id = idDocumento(rec, idField, indice);
    await coleccion.doc(id).set({
      ...prepararDocumento(rec),
      fecha_carga: FieldValue.serverTimestamp(),
    });
    subidos++;
    if (subidos % 50 === 0) logger.info('%d/%d documentos subidos', subidos, registros.length);
  }

  logger.info('Subidos %d documentos a %s', subidos, destino.collection);
  return subidos;
}
