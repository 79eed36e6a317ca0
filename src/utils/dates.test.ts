import { describe, expect, it } from 'vitest';
import { diasDelRango, fechaCompacta, fechaIso, parseFechaCli } from './dates.js';

describe('parseFechaCli', () => {
  it('lee dd/MM/yyyy', () => {
    const fecha = parseFechaCli('03/07/2025');
    expect(fecha && fechaIso(fecha)).toBe('2025-07-03');
  });

  it('rechaza formatos inválidos', () => {
    expect(parseFechaCli('2025-07-03')).toBeNull();
    expect(parseFechaCli('32/01/2025')).toBeNull();
  });
});

describe('diasDelRango', () => {
  it('incluye ambos extremos', () => {
    const dias = diasDelRango(new Date(2025, 6, 30), new Date(2025, 7, 2)).map(fechaCompacta);
    expect(dias).toEqual(['20250730', '20250731', '20250801', '20250802']);
  });

  it('un solo día', () => {
    expect(diasDelRango(new Date(2025, 6, 3, 15), new Date(2025, 6, 3, 9))).toHaveLength(1);
  });

  it('falla si desde es posterior a hasta', () => {
    expect(() => diasDelRango(new Date(2025, 6, 5), new Date(2025, 6, 3))).toThrow(
      'Rango de fechas inválido: 2025-07-05 es posterior a 2025-07-03'
    );
  });
});
