export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class EscalationExhaustedError extends Error {
  constructor(
    readonly depth: number,
    readonly category: string
  ) {
    super(
      `Task stuck in interactive loop: ${category} prompt still unresolved after ${depth} responses`
    );
    this.name = 'EscalationExhaustedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
