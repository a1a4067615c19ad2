export type ConfirmationState = 'PROMPTED' | 'CONFIRMED' | 'CANCELLED';

export function confirmationPhrase(schema: string): string {
  return `DELETE ${schema.toUpperCase()}`;
}

/**
 * Typed-phrase gate for destructive actions. Starts PROMPTED and settles once:
 * the exact phrase confirms, any other input cancels.
 */
export class Confirmation {
  readonly phrase: string;
  private current: ConfirmationState = 'PROMPTED';

  constructor(schema: string) {
    this.phrase = confirmationPhrase(schema);
  }

  get state(): ConfirmationState {
    return this.current;
  }

  get message(): string {
    return `Type '${this.phrase}' to confirm:`;
  }

  submit(input: string): ConfirmationState {
    if (this.current === 'PROMPTED') {
      this.current = input === this.phrase ? 'CONFIRMED' : 'CANCELLED';
    }
    return this.current;
  }
}
