import {optional} from '@optique/core/modifiers';
import {argument, option} from '@optique/core/primitives';
import {choice, string} from '@optique/core/valueparser';
import {message} from '@optique/core/message';


// Output format choices
export const outputFormat = choice(['text', 'json']);

export type OutputFormat = 'text' | 'json'

// Common output option (text, json)
export const outputOption = optional(option('-o', '--output', outputFormat, { description: message`Output format (text, json)` }));

// Positional URL of the document a command starts from
export const documentUrl = argument(string({ metavar: 'URL' }), { description: message`Document URL` });
