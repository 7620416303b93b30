export class SpeakerBuffer {
  readonly speakerId: string;
  readonly createdAt: number;
  private fragments: Buffer[];
  private bytes: number;

  constructor(speakerId: string, createdAt = Date.now()) {
    this.speakerId = speakerId;
    this.createdAt = createdAt;
    this.fragments = [];
    this.bytes = 0;
  }

  append(fragment: Buffer) {
    if (!fragment.length) return;
    this.fragments.push(fragment);
    this.bytes += fragment.length;
  }

  get fragmentCount() {
    return this.fragments.length;
  }

  get byteLength() {
    return this.bytes;
  }

  isEmpty() {
    return this.fragments.length === 0;
  }

  drain(): readonly Buffer[] {
    const drained = Object.freeze(this.fragments);
    this.fragments = [];
    this.bytes = 0;
    return drained;
  }
}
