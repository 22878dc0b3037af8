/**
 * Savitzky–Golay smoothing with polynomial-fit edges.
 *
 * Interior points use the centred window. The first and last half-window of
 * points are evaluated from the polynomial fitted to the first and last full
 * window, so a polynomial of degree <= polyorder passes through unchanged.
 */

import { SeriesTooShortError } from '../errors.js';

export interface SavitzkyGolayParams {
  windowLength: number;
  polyorder: number;
}

function invertMatrix(mat: number[][]): number[][] {
  const n = mat.length;
  const a = mat.map((row) => row.slice());
  const inv: number[][] = Array.from({ length: n }, (_, r) =>
    Array.from({ length: n }, (_, c) => (r === c ? 1 : 0)),
  );

  for (let col = 0; col < n; col += 1) {
    let pivotRow = col;
    let pivotAbs = Math.abs(a[col]?.[col] ?? 0);
    for (let r = col + 1; r < n; r += 1) {
      const v = Math.abs(a[r]?.[col] ?? 0);
      if (v > pivotAbs) {
        pivotAbs = v;
        pivotRow = r;
      }
    }

    if (pivotAbs === 0 || !Number.isFinite(pivotAbs)) {
      throw new Error('Smoothing failed (singular matrix)');
    }

    if (pivotRow !== col) {
      [a[col], a[pivotRow]] = [a[pivotRow] ?? [], a[col] ?? []];
      [inv[col], inv[pivotRow]] = [inv[pivotRow] ?? [], inv[col] ?? []];
    }

    const pivotRowA = a[col] ?? [];
    const pivotRowInv = inv[col] ?? [];
    const pivot = pivotRowA[col] ?? 1;
    for (let c = 0; c < n; c += 1) {
      pivotRowA[c] = (pivotRowA[c] ?? 0) / pivot;
      pivotRowInv[c] = (pivotRowInv[c] ?? 0) / pivot;
    }

    for (let r = 0; r < n; r += 1) {
      if (r === col) continue;
      const rowA = a[r] ?? [];
      const rowInv = inv[r] ?? [];
      const factor = rowA[col] ?? 0;
      if (factor === 0) continue;
      for (let c = 0; c < n; c += 1) {
        rowA[c] = (rowA[c] ?? 0) - factor * (pivotRowA[c] ?? 0);
        rowInv[c] = (rowInv[c] ?? 0) - factor * (pivotRowInv[c] ?? 0);
      }
    }
  }

  return inv;
}

/**
 * Projection matrix H = A (AᵀA)⁻¹ Aᵀ for a window of `windowLength` points.
 *
 * Row j of H gives the fitted value at window position j as a weighted sum
 * of the window's samples; the middle row is the classic smoothing kernel.
 */
export function projectionMatrix(params: SavitzkyGolayParams): number[][] {
  const wl = params.windowLength;
  const p = params.polyorder;
  const m = (wl - 1) / 2;

  const design: number[][] = [];
  for (let k = -m; k <= m; k += 1) {
    const row: number[] = [];
    let pow = 1;
    for (let j = 0; j <= p; j += 1) {
      row.push(pow);
      pow *= k;
    }
    design.push(row);
  }

  const atA: number[][] = Array.from({ length: p + 1 }, (_, r) =>
    Array.from({ length: p + 1 }, (_, c) => design.reduce((s, row) => s + (row[r] ?? 0) * (row[c] ?? 0), 0)),
  );
  const inv = invertMatrix(atA);

  // (AᵀA)⁻¹ Aᵀ, one column per window position
  const pseudo: number[][] = inv.map((invRow) =>
    design.map((designRow) => invRow.reduce((s, v, j) => s + v * (designRow[j] ?? 0), 0)),
  );

  return design.map((designRow) =>
    Array.from({ length: wl }, (_, col) =>
      designRow.reduce((s, v, j) => s + v * (pseudo[j]?.[col] ?? 0), 0),
    ),
  );
}

function weightedSum(weights: readonly number[], y: readonly number[], offset: number): number {
  let s = 0;
  for (let i = 0; i < weights.length; i += 1) {
    s += (weights[i] ?? 0) * (y[offset + i] ?? 0);
  }
  return s;
}

export function savitzkyGolaySmooth(y: readonly number[], params: SavitzkyGolayParams): number[] {
  const wl = Math.floor(params.windowLength);
  const p = Math.floor(params.polyorder);

  if (wl < 3 || wl % 2 === 0) throw new Error('Savitzky-Golay window length must be an odd integer >= 3');
  if (p < 0 || p >= wl) throw new Error('Savitzky-Golay polyorder must be >= 0 and < window length');
  if (y.length < wl) throw new SeriesTooShortError(y.length, wl);

  const m = (wl - 1) / 2;
  const h = projectionMatrix({ windowLength: wl, polyorder: p });
  const centre = h[m] ?? [];
  const n = y.length;
  const out = new Array<number>(n);

  for (let i = 0; i < n; i += 1) {
    if (i < m) {
      out[i] = weightedSum(h[i] ?? [], y, 0);
    } else if (i >= n - m) {
      out[i] = weightedSum(h[i - (n - wl)] ?? [], y, n - wl);
    } else {
      out[i] = weightedSum(centre, y, i - m);
    }
  }
  return out;
}
