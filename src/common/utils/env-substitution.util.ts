// $VAR_NAME or ${VAR_NAME}; names are upper-case with underscores
const PLACEHOLDER_PATTERN = /\$(\{([A-Z_][A-Z0-9_]*)\}|([A-Z_][A-Z0-9_]*))/g;

export class EnvSubstitutionUtil {
  /**
   * Replaces environment placeholders in raw config text.
   * Placeholders whose variable is unset are left untouched.
   */
  static substitute(
    text: string,
    env: NodeJS.ProcessEnv = process.env,
  ): string {
    return text.replace(
      PLACEHOLDER_PATTERN,
      (found: string, _group: string, braced?: string, bare?: string) => {
        const name = braced ?? bare;
        if (!name) return found;
        const value = env[name];
        return value === undefined ? found : value;
      },
    );
  }
}
