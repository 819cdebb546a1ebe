// Caracteres reservados de MarkdownV2 según la API de bots de Telegram
export function escapeMarkdownV2(text: string): string {
  if (!text) return '';
  return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');
}

export function formatCommandUsage(command: string, example: string): string {
  return `Uso: /${command} ${example}`;
}
