import { DEFAULT_GENERATION_CONFIG, type GenerationConfig, type PromptRequest } from '../provider';

export const TICKET_TEXT_PLACEHOLDER = '{ticket_text}';

export const TICKET_CLASSIFICATION_TEMPLATE = [
  'You are an AI assistant designed to classify and respond to support tickets.',
  'For each ticket, perform the following tasks:',
  '1. Classify the issue into a professional category based on the content of the ticket.',
  'Categories can include but are not limited to: technical issues, hardware issues,',
  'data recovery, software issues, user error, connectivity issues, or other relevant',
  'categories based on the ticket.',
  '2. Assign relevant tags that describe the issue. Tags can include data loss,',
  'internet connectivity, slow performance, security concerns, software crashes,',
  'or anything else related to the issue at hand.',
  '3. Determine the priority based on urgency: high, medium, or low.',
  '4. Suggest an estimated resolution time. For example, 2 hours, 4 hours, 1 day, or',
  "any reasonable estimate based on the issue's complexity.",
  "5. Generate a polite and empathetic first reply that acknowledges the user's concern,",
  'offers assistance, and sets expectations.',
  '6. Analyze sentiment of the ticket: positive, negative, or neutral,',
  'based on the tone and content of the customer.',
  '',
  `Support Ticket: ${TICKET_TEXT_PLACEHOLDER}`,
  '',
  'Your response should be in the following JSON format:',
  '{',
  '    "category": "<category>",',
  '    "tags": ["<tag1>", "<tag2>"],',
  '    "priority": "<priority>",',
  '    "suggested_eta": "<time>",',
  '    "generated_reply": "<reply>",',
  '    "sentiment": "<sentiment>"',
  '}'
].join('\n');

const placeholderAt = TICKET_CLASSIFICATION_TEMPLATE.indexOf(TICKET_TEXT_PLACEHOLDER);
const TEMPLATE_HEAD = TICKET_CLASSIFICATION_TEMPLATE.slice(0, placeholderAt);
const TEMPLATE_TAIL = TICKET_CLASSIFICATION_TEMPLATE.slice(placeholderAt + TICKET_TEXT_PLACEHOLDER.length);

// Concatenation rather than String.replace: ticket text may contain `$&` and friends.
export function renderTicketClassificationPrompt(ticketText: string): string {
  return `${TEMPLATE_HEAD}${ticketText}${TEMPLATE_TAIL}`;
}

export function buildPromptRequest(
  ticketText: string,
  generationConfig: GenerationConfig = DEFAULT_GENERATION_CONFIG
): PromptRequest {
  return {
    renderedText: renderTicketClassificationPrompt(ticketText),
    generationConfig: { ...generationConfig }
  };
}
