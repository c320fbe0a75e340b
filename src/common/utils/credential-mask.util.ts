export class CredentialMaskUtil {
  private static readonly MASK_VALUE = '*****';
  private static readonly VISIBLE_SUFFIX = 4;

  /**
   * Masks a secret for logging, keeping only its last characters
   * when the secret is long enough for that to be safe.
   */
  static maskSecret(secret: string | undefined): string {
    if (!secret) {
      return 'NOT_SET';
    }
    if (secret.length <= this.VISIBLE_SUFFIX * 3) {
      return this.MASK_VALUE;
    }
    return `${this.MASK_VALUE}${secret.slice(-this.VISIBLE_SUFFIX)}`;
  }
}
