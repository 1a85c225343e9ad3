import type { SourceKind } from '@route-plotter/shared';
import { DEFAULT_COMMAND_PREFIX } from '../config.js';
import type { PlotInput } from '../sources/PlotSource.js';

export type PlotCommand =
  | { type: 'ignored' }
  | { type: 'help' }
  | { type: 'clear'; names: string[] }
  | { type: 'plot'; source: SourceKind; input: PlotInput };

const SOURCE_KEYWORDS: readonly SourceKind[] = ['coords', 'route'];

function isSourceKind(word: string): word is SourceKind {
  return SOURCE_KEYWORDS.some((kind) => kind === word);
}

/** Text after the first `count` whitespace-separated words */
function skipWords(text: string, count: number): string {
  let rest = text.trimStart();
  for (let i = 0; i < count; i++) {
    const match = /^\S+\s*/.exec(rest);
    if (!match) return '';
    rest = rest.slice(match[0].length);
  }
  return rest;
}

/**
 * PlotCommandParser: split a command line into a plotter command.
 *
 *   ".plot"                       help
 *   ".plot help"                  help
 *   ".plot clear [NAME]..."       clear
 *   ".plot coords [NAME] STRING"  legacy coordinate string
 *   ".plot route [NAME] ROUTE"    flight plan route
 *   ".plot [NAME] ROUTE"          shortcut for route
 *
 * Keywords are case-sensitive.
 */
export class PlotCommandParser {
  constructor(private readonly prefix = DEFAULT_COMMAND_PREFIX) {}

  parse(rawText: string): PlotCommand {
    const parts = rawText.split(/\s+/).filter((part) => part.length > 0);

    if (parts.length === 0 || parts[0] !== this.prefix) {
      return { type: 'ignored' };
    }

    if (parts.length === 1 || parts[1] === 'help') {
      return { type: 'help' };
    }

    if (parts[1] === 'clear') {
      return { type: 'clear', names: parts.slice(2) };
    }

    // Unknown keywords are the first word of a route
    const keyword = parts[1];
    const source: SourceKind = isSourceKind(keyword) ? keyword : 'route';
    const offset = isSourceKind(keyword) ? 2 : 1;

    return {
      type: 'plot',
      source,
      input: {
        tokens: parts.slice(offset),
        rawArgs: skipWords(rawText, offset),
      },
    };
  }
}
