export type KeyErrorCode = 'UnsupportedAlgorithm' | 'InvalidPublicKey';

export class KeyError extends Error {
  constructor(
    readonly code: KeyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'KeyError';
  }
}
