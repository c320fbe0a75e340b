// Custom emoji in Discord's <:name:id> or <a:name:id> form
const CUSTOM_EMOJI_PATTERN = /^<(a)?:([^:]+):(\d+)>$/;

export class EmojiUtil {
  /**
   * Name used when comparing a configured emoji against reaction data.
   * Reactions only carry the emoji name, so custom emojis compare by name.
   */
  static nameOf(emoji: string): string {
    const match = emoji.match(CUSTOM_EMOJI_PATTERN);
    return match ? match[2] : emoji;
  }

  static matches(configured: string, reactionEmoji: string): boolean {
    return EmojiUtil.nameOf(configured) === reactionEmoji;
  }

  /**
   * Form accepted by the Discord API when reacting: id for custom emojis,
   * the emoji itself otherwise.
   */
  static toReactionIdentifier(emoji: string): string {
    const match = emoji.match(CUSTOM_EMOJI_PATTERN);
    return match ? match[3] : emoji;
  }
}
