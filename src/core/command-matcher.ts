/**
 * Command matching for plugin triggers
 */

export interface CommandMatch {
  /** The configured trigger that matched, as configured */
  trigger: string;
  /** Text after the trigger, trimmed */
  query: string;
}

const ASCII_WORD = /^[A-Za-z0-9_]$/;

/**
 * A trigger ends at a token boundary when the text ends there, whitespace
 * follows, or the trigger and the following character are not both ASCII
 * word characters ("sf hello", "搜三体", but not "sfx").
 */
function endsAtBoundary(text: string, trigger: string): boolean {
  const next = text.charAt(trigger.length);
  if (next === '' || /\s/.test(next)) {
    return true;
  }

  const last = trigger.charAt(trigger.length - 1);
  return !(ASCII_WORD.test(last) && ASCII_WORD.test(next));
}

/**
 * Match message text against an ordered trigger list.
 * Case-insensitive; the first trigger in configured order wins.
 *
 * @returns The match, or null when no trigger leads the text
 */
export function matchCommand(text: string, triggers: readonly string[]): CommandMatch | null {
  const content = text.trim();
  const lowered = content.toLowerCase();

  for (const trigger of triggers) {
    if (trigger.length === 0) continue;

    if (lowered.startsWith(trigger.toLowerCase()) && endsAtBoundary(content, trigger)) {
      return {
        trigger,
        query: content.slice(trigger.length).trim(),
      };
    }
  }

  return null;
}

/**
 * Strip host artefacts from message text: a leading "@nick " mention and,
 * in group chats, a "wxid_xxx:" sender prefix.
 */
export function normalizeContent(content: string, isGroup: boolean): string {
  let text = content.trim();

  if (isGroup) {
    text = text.replace(/^(wxid_[A-Za-z0-9_-]+:\s*|[A-Za-z][A-Za-z0-9_-]{5,19}:\n)/, '');
  }

  // WeChat separates a mention from the text with U+2005, which \s covers
  text = text.replace(/^(@\S+\s+)+/, '');

  return text.trim();
}
