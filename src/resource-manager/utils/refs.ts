import crypto from 'crypto';

export class Refs {
  private static HASH_LENGTH = 8;
  public static DEFAULT_MAX_LENGTH = 63;

  /**
   * Sanitizes `ref` into a dns-safe name and suffixes it with a short hash of `seed` (defaults to `ref`)
   */
  public static safeRef(ref: string, seed?: string, max_length: number = Refs.DEFAULT_MAX_LENGTH): string {
    if (max_length < Refs.HASH_LENGTH) {
      throw new Error('Max length cannot be less than hash length');
    }

    const sanitized_ref = ref.replace(/[^a-zA-Z0-9-]/g, '-');
    const truncated_ref = sanitized_ref.substring(0, (max_length - 1) - Refs.HASH_LENGTH);
    const hash = Refs.toDigest(seed || ref).substring(0, Refs.HASH_LENGTH);

    return `${truncated_ref}-${hash}`;
  }

  /**
   * This is not a standard base64 md5 hash as we lowercase and replace punctuation
   * This method should not be used for anything beyond conveniently adding entropy to the safeRef.
   */
  private static toDigest(uri: string): string {
    return crypto.createHash('md5').update(uri)
      .digest('base64') // base64 adds entropy in a more compact string
      .toLowerCase() // we need to makes everything lower which unfortunately removes some entropy
      .replace(/[\\/+=]/g, ''); // we also remove occurances of slash, plus, and equals to make url-safe
  }
}
