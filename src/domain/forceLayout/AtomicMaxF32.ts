/**
 * Running maximum of non-negative float32 values. The state lives in a
 * `SharedArrayBuffer`, so chunks run on other threads can write the same maximum.
 * Non-negative IEEE-754 floats order the same way as their bit patterns read as
 * signed integers, so a compare-exchange loop on the Int32 view is enough.
 */
export class AtomicMaxF32 {
  public readonly buffer: SharedArrayBuffer;
  private readonly bits: Int32Array;

  public constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(4)) {
    this.buffer = buffer;
    this.bits = new Int32Array(buffer, 0, 1);
  }

  public update(value: number): void {
    if (!(value > 0)) {
      return;
    }
    const candidate = floatToBits(value);
    let current = Atomics.load(this.bits, 0);
    while (candidate > current) {
      const observed = Atomics.compareExchange(this.bits, 0, current, candidate);
      if (observed === current) {
        return;
      }
      current = observed;
    }
  }

  public get value(): number {
    return bitsToFloat(Atomics.load(this.bits, 0));
  }
}

function floatToBits(value: number): number {
  const scratch = new Float32Array(1);
  scratch[0] = value;
  return new Int32Array(scratch.buffer)[0];
}

function bitsToFloat(bits: number): number {
  const scratch = new Int32Array(1);
  scratch[0] = bits;
  return new Float32Array(scratch.buffer)[0];
}
