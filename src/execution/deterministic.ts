import { createHash } from "crypto";

export function seedFrom(parts: string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest();
}

export function floatBetween(seed: Buffer, offset: number, min: number, max: number): number {
  const idx = offset % Math.max(1, seed.byteLength - 4);
  const n = seed.readUInt32BE(idx);
  const unit = n / 0xffffffff;
  return min + unit * (max - min);
}

export function intBetween(seed: Buffer, offset: number, min: number, max: number): number {
  const f = floatBetween(seed, offset, 0, 1);
  return Math.min(max, Math.floor(min + f * (max - min + 1)));
}

const AMINO_ACIDS = "ACDEFGHILMNPQSTVWY";

/** Tryptic-looking peptide sequence derived from the seed. */
export function peptideFrom(seed: Buffer, length: number): string {
  let out = "";
  for (let i = 0; i < length - 1; i++) {
    const b = seed[i % seed.byteLength] ?? 0;
    out += AMINO_ACIDS[(b + i * 7) % AMINO_ACIDS.length] ?? "A";
  }
  return out + ((seed[0] ?? 0) % 2 === 0 ? "K" : "R");
}
