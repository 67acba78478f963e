import { ContentKind } from '../types/conversation';

function isMarkdownLink(content: string): boolean {
  return content.startsWith('[') && content.includes('](') && content.endsWith(')');
}

/**
 * Derives the stored message type from message text. Media arrives as markdown:
 * `![caption](url)` for images, `[Audio Message](url)` for voice notes and
 * `[name](url)` for any other attachment.
 */
export function classifyContent(content: string, isVoice: boolean = false): ContentKind {
  if (isVoice) {
    return 'audio';
  }

  if (content.startsWith('![') && content.includes('](') && content.endsWith(')')) {
    return 'image';
  }

  if (isMarkdownLink(content)) {
    return content.includes('Audio Message') ? 'audio' : 'document';
  }

  return 'text';
}
