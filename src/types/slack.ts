/**
 * The subset of Slack Block Kit the digest posts.
 */

export interface PlainTextObject {
  type: 'plain_text';
  text: string;
  emoji?: boolean;
}

export interface MrkdwnTextObject {
  type: 'mrkdwn';
  text: string;
}

export interface HeaderBlock {
  type: 'header';
  text: PlainTextObject;
}

export interface SectionBlock {
  type: 'section';
  text: MrkdwnTextObject;
}

export interface DividerBlock {
  type: 'divider';
}

export interface ContextBlock {
  type: 'context';
  elements: MrkdwnTextObject[];
}

export type ChatBlock = HeaderBlock | SectionBlock | DividerBlock | ContextBlock;

export interface ChatMessage {
  blocks: ChatBlock[];
}
