import type { ExcuseRequest } from '../../excuse/types';

export const SERIOUSNESS_DESCRIPTIONS: Readonly<Record<number, string>> = {
  1: 'very silly and humorous',
  2: 'light and playful',
  3: 'balanced and professional',
  4: 'serious and formal',
  5: 'very serious and professional',
};

export const EXCUSE_EMAIL_PROMPT_V1 = {
  system: 'You are an expert email writer.',
  task: 'Generate a professional excuse email based on the following requirements:',
  output_schema: {
    subject: 'Appropriate email subject line',
    body: 'Complete email body with greeting, apology, reason, next steps, and sign-off',
  },
  closing: 'Return only the JSON response, no additional text.',
};

export function describeSeriousness(level: number): string {
  return SERIOUSNESS_DESCRIPTIONS[level] ?? 'balanced';
}

export function buildExcusePrompt(request: ExcuseRequest): string {
  const { category, tone, seriousness, recipient_name, sender_name, eta_when } = request;
  const level = describeSeriousness(seriousness);
  const { system, task, output_schema, closing } = EXCUSE_EMAIL_PROMPT_V1;

  return [
    `${system} ${task}`,
    '',
    `Category: ${category}`,
    `Tone: ${tone}`,
    `Seriousness Level: ${level} (scale 1-5, current: ${seriousness})`,
    `Recipient: ${recipient_name}`,
    `Sender: ${sender_name}`,
    `ETA/When: ${eta_when}`,
    '',
    'Please generate a JSON response with the following structure:',
    JSON.stringify(output_schema, null, 4),
    '',
    'Requirements:',
    `- The email should be appropriate for the ${tone} tone`,
    `- Match the ${level} seriousness level`,
    `- Include the specific ETA/when information: ${eta_when}`,
    `- Address ${recipient_name} appropriately`,
    `- Sign off from ${sender_name}`,
    '- Keep it professional but match the requested tone',
    '- The body should be well-formatted with proper paragraphs',
    '',
    closing,
  ].join('\n').trim();
}
