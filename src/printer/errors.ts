export type PrintStage = 'fields' | 'edges' | 'write';

export class PrintError extends Error {
  // every failure of the print call, starting with this one
  public readonly failures: PrintError[] = [this];

  public constructor(public readonly typeName: string, public readonly stage: PrintStage, cause: unknown) {
    super(`Failed to print ${stage === 'write' ? 'output' : `${stage} table`} for ${typeName}: ${getMessage(cause)}`, {
      cause,
    });
    this.name = 'PrintError';
  }
}

function getMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
