/**
 * How raw line bytes are turned into text.
 *
 * - `latin1-to-utf8`: read as Latin-1; if that yields C1 control characters,
 *   re-read the same bytes as strict UTF-8 and keep that reading when it is
 *   valid and free of C1 controls. Otherwise the Latin-1 text stands.
 * - `latin1-escape`: read as Latin-1 and write C1 control characters as
 *   `\xNN` escapes.
 *
 * Every byte sequence is valid Latin-1, so neither strategy fails.
 */
export type EncodingStrategy = 'latin1-to-utf8' | 'latin1-escape';

// C1 controls (U+0080–U+009F) rarely occur in Latin-1 text written by the
// export; they usually mark bytes of a multi-byte UTF-8 sequence. Stray
// Windows-1252 punctuation (0x92 for ’) lands here as well.
const C1_CONTROLS = /[\u0080-\u009f]/;
const C1_CONTROLS_GLOBAL = /[\u0080-\u009f]/g;

/** Decodes the bytes of a single export line (terminator already removed). */
export class LineDecoder {
  private readonly strategy: EncodingStrategy;
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

  constructor(strategy: EncodingStrategy = 'latin1-to-utf8') {
    this.strategy = strategy;
  }

  decode(bytes: Uint8Array): string {
    const latin1 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');

    if (this.strategy === 'latin1-escape') {
      return escapeControls(latin1);
    }

    if (isClean(latin1)) {
      return latin1;
    }

    const utf8 = this.tryUtf8(bytes);
    return utf8 !== null && isClean(utf8) ? utf8 : latin1;
  }

  private tryUtf8(bytes: Uint8Array): string | null {
    try {
      return this.utf8.decode(bytes);
    } catch (error) {
      if (error instanceof TypeError) return null;
      throw error;
    }
  }
}

function isClean(text: string): boolean {
  return !C1_CONTROLS.test(text);
}

function escapeControls(text: string): string {
  return text.replace(C1_CONTROLS_GLOBAL, (ch) => `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}
