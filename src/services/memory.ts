/**
 * Pokemon Emerald (US) memory layout and little-endian helpers.
 *
 * Reference: pret/pokeemerald decomp (include/pokemon.h, include/pokemon_storage_system.h)
 */

// ─── Fixed EWRAM/IWRAM addresses ────────────────────────────────────────────

export const PARTY_COUNT_ADDR     = 0x020244e9; // u8 gPlayerPartyCount
export const PARTY_SLOT_1_ADDR    = 0x020244ec; // struct Pokemon gPlayerParty[6]
export const ENEMY_PARTY_ADDR     = 0x02024744; // struct Pokemon gEnemyParty[6]
export const RNG_SEED_ADDR        = 0x03005d80; // u32 gRngValue
export const POKEMON_STORAGE_PTR  = 0x03005d94; // struct PokemonStorage *gPokemonStoragePtr

// ─── struct Pokemon / struct BoxPokemon ─────────────────────────────────────
//
// struct BoxPokemon {
//   /*0x00*/ u32 personality;
//   /*0x04*/ u32 otId;              // trainerId | secretId << 16
//   /*0x08*/ u8  nickname[10];
//   /*0x12*/ u8  language;
//   /*0x13*/ u8  flags;
//   /*0x14*/ u8  otName[7];
//   /*0x1B*/ u8  markings;
//   /*0x1C*/ u16 checksum;
//   /*0x1E*/ u16 unknown;
//   /*0x20*/ u32 secure[12];        // 4 encrypted 12-byte substructures
// }
//
// struct Pokemon appends 20 bytes of unencrypted battle stats (status, level, HP...).

export const PARTY_RECORD_SIZE      = 100;
export const BOX_RECORD_SIZE        = 80;
export const RECORD_HEADER_SIZE     = 0x20;
export const IDENTIFIER_OFFSET      = 0x00;
export const ORIGIN_TRAINER_OFFSET  = 0x04;
export const SECRET_ID_OFFSET       = 0x06;
export const CHECKSUM_OFFSET        = 0x1c;
export const ENCRYPTED_OFFSET       = 0x20;
export const SUBSTRUCTURE_SIZE      = 12;
export const ENCRYPTED_SIZE         = 48;

// ─── struct PokemonStorage ──────────────────────────────────────────────────
//
// struct PokemonStorage {
//   /*0x0000*/ u8 currentBox;                      // + 3 bytes padding
//   /*0x0004*/ struct BoxPokemon boxes[14][30];    // 14 × 30 × 80 bytes
//   /*0x8344*/ u8 boxNames[14][9];
//   /*0x83C2*/ u8 boxWallpapers[14];
// }

export const STORAGE_HEADER_SIZE = 4;
export const BANK_COUNT          = 14;
export const SLOTS_PER_BANK      = 30;
export const STORAGE_TRAILER_SIZE = 14 * 9 + 14;
export const STORAGE_SIZE =
  STORAGE_HEADER_SIZE + BANK_COUNT * SLOTS_PER_BANK * BOX_RECORD_SIZE + STORAGE_TRAILER_SIZE;

// EWRAM bounds used to sanity-check pointers read from IWRAM
export const EWRAM_START = 0x02000000;
export const EWRAM_END   = 0x0203ffff;

/**
 * Read a 16-bit little-endian unsigned integer from a byte array.
 */
export function readU16LE(data: Uint8Array, offset: number = 0): number {
  return (data[offset] ?? 0) | ((data[offset + 1] ?? 0) << 8);
}

/**
 * Read a 32-bit little-endian unsigned integer from a byte array.
 */
export function readU32LE(data: Uint8Array, offset: number = 0): number {
  return (
    ((data[offset] ?? 0) |
      ((data[offset + 1] ?? 0) << 8) |
      ((data[offset + 2] ?? 0) << 16) |
      ((data[offset + 3] ?? 0) << 24)) >>>
    0
  );
}

export function writeU16LE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = value & 0xff;
  data[offset + 1] = (value >>> 8) & 0xff;
}

export function writeU32LE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = value & 0xff;
  data[offset + 1] = (value >>> 8) & 0xff;
  data[offset + 2] = (value >>> 16) & 0xff;
  data[offset + 3] = (value >>> 24) & 0xff;
}

export function u32ToBytes(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  writeU32LE(bytes, 0, value);
  return bytes;
}

export function isAllZero(data: Uint8Array): boolean {
  for (const byte of data) {
    if (byte !== 0) return false;
  }
  return true;
}
