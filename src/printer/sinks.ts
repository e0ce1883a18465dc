import type { OutputSink } from './api';

export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  public write(text: string): void {
    this.chunks.push(text);
  }

  public toString(): string {
    return this.chunks.join('');
  }
}
