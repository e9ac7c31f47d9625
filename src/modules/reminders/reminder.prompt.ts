/**
 * Prompts for turning free-form text into reminders
 */

export const FORMAT_REMINDER_SYSTEM_PROMPT =
  'Format user input as one or more reminders. Extract title, date and time for each reminder. ' +
  'Always return a JSON array with each reminder having id, title, date and time fields. ' +
  'Date should be in YYYY-MM-DD format. If the date is not mentioned set it to null, and the same for the title. ' +
  'Time should be in HH:MM format. ' +
  'If there are multiple reminders in the input, create multiple JSON objects in the array.';

export function buildFormatReminderPrompt(input: string): string {
  return `Parse this into reminders: ${input}`;
}
