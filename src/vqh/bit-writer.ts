// Writes bits MSB-first within each byte, to increasing byte addresses.
// Example: '1', '0', '1' -> BYTE-0: 1010 0000
// Unwritten trailing bits of the last byte stay zero.
export class BitWriter {
    private buffer: Uint8Array;
    private pos = 0; // bit position

    constructor(initialBits: number = 4096) {
        this.buffer = new Uint8Array(Math.max(1, (initialBits + 7) >>> 3));
    }

    get bitLength(): number {
        return this.pos;
    }

    private ensureCapacity(bits: number): void {
        const bytesNeeded = (this.pos + bits + 7) >>> 3;
        if (bytesNeeded > this.buffer.length) {
            const next = new Uint8Array(Math.max(this.buffer.length * 2, bytesNeeded));
            next.set(this.buffer);
            this.buffer = next;
        }
    }

    writeBit(bit: 0 | 1): void {
        this.ensureCapacity(1);
        if (bit) this.buffer[this.pos >>> 3] |= 0x80 >>> (this.pos & 7);
        this.pos++;
    }

    /** Appends a code given as a '0'/'1' string. */
    writeCode(code: string): void {
        this.ensureCapacity(code.length);
        for (let i = 0; i < code.length; i++) {
            if (code.charCodeAt(i) === 0x31) this.buffer[this.pos >>> 3] |= 0x80 >>> (this.pos & 7);
            this.pos++;
        }
    }

    /** Returns exactly ceil(bitLength / 8) bytes. */
    finish(): Uint8Array {
        return this.buffer.slice(0, (this.pos + 7) >>> 3);
    }
}
