// Local text analysis: stack traces and issue templates

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition } from './types.js';

export const NO_STACK_TRACE_MESSAGE = 'No clear stack trace found in the text.';

export interface StackFrame {
  file: string;
  line: number;
  column?: number;
  functionName?: string;
}

export interface StackTraceFindings {
  errorType?: string;
  errorMessage?: string;
  frames: StackFrame[];
  functions: string[];
  hasTraceback: boolean;
}

const ERROR_PATTERN = /\b(\w+(?:Error|Exception)):\s*(.+)/;
const TRACEBACK_PATTERN = /Traceback\s*\(most recent call last\):/i;
// File "app/main.py", line 12, in handler
const PY_FRAME_PATTERN = /File\s+"([^"]+)",\s+line\s+(\d+)(?:,\s+in\s+([\w<>.]+))?/g;
// at handler (src/app.js:12:5)  |  at src/app.js:12:5
const JS_FRAME_PATTERN = /^\s*at\s+(?:(\S.*?)\s+\()?((?:[A-Za-z]:)?[^\s()]+?):(\d+):(\d+)\)?\s*$/gm;

export function analyzeStackTrace(text: string): StackTraceFindings {
  const findings: StackTraceFindings = {
    frames: [],
    functions: [],
    hasTraceback: TRACEBACK_PATTERN.test(text),
  };

  const errorMatch = ERROR_PATTERN.exec(text);
  if (errorMatch) {
    findings.errorType = errorMatch[1];
    findings.errorMessage = errorMatch[2].trim();
  }

  for (const match of text.matchAll(PY_FRAME_PATTERN)) {
    findings.frames.push({
      file: match[1],
      line: Number(match[2]),
      functionName: match[3],
    });
  }

  for (const match of text.matchAll(JS_FRAME_PATTERN)) {
    findings.frames.push({
      file: match[2],
      line: Number(match[3]),
      column: Number(match[4]),
      functionName: match[1],
    });
  }

  for (const frame of findings.frames) {
    if (frame.functionName && !findings.functions.includes(frame.functionName)) {
      findings.functions.push(frame.functionName);
    }
  }

  return findings;
}

export function formatStackTraceAnalysis(findings: StackTraceFindings): string {
  if (!findings.errorType && !findings.hasTraceback && findings.frames.length === 0) {
    return NO_STACK_TRACE_MESSAGE;
  }

  const output = ['# Stack Trace Analysis', ''];

  if (findings.errorType) {
    output.push(`**Error Type:** ${findings.errorType}`);
  }
  if (findings.errorMessage) {
    output.push(`**Error Message:** ${findings.errorMessage}`);
  }

  if (findings.frames.length > 0) {
    output.push('', '## Frames');
    for (const frame of findings.frames) {
      const location = frame.column !== undefined ? `line ${frame.line}:${frame.column}` : `line ${frame.line}`;
      const fn = frame.functionName ? ` in \`${frame.functionName}\`` : '';
      output.push(`- \`${frame.file}\` at ${location}${fn}`);
    }
  }

  if (findings.functions.length > 0) {
    output.push('', '## Functions in Call Stack');
    for (const fn of findings.functions) {
      output.push(`- \`${fn}()\``);
    }
  }

  output.push(
    '',
    'Next steps:',
    '1. Search code for the files mentioned',
    '2. Read the specific file and line',
    '3. Search online for the error message'
  );

  return output.join('\n');
}

const extractStackTraceSchema = z.object({
  text: z.string(),
});

export class ExtractStackTraceTool extends BaseTool<typeof extractStackTraceSchema> {
  readonly definition: ToolDefinition = {
    name: 'extract_stack_trace',
    description: 'Parse a stack trace out of free text: error type and message, file/line frames, and the functions in the call stack.',
    parameters: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text that may contain a stack trace' },
      },
      required: ['text'],
    },
  };

  protected readonly schema = extractStackTraceSchema;

  protected async executeInternal(args: z.infer<typeof extractStackTraceSchema>): Promise<string> {
    return formatStackTraceAnalysis(analyzeStackTrace(args.text));
  }
}

export type IssueSection = 'environment' | 'steps' | 'expected' | 'actual' | 'version';

const SECTION_PATTERNS: Array<[IssueSection, string, RegExp]> = [
  ['environment', 'Environment', /^#{1,6}\s*environment/im],
  ['steps', 'Steps to reproduce', /^#{1,6}\s*(?:steps to reproduce|reproduction)/im],
  ['expected', 'Expected behavior', /^#{1,6}\s*expected (?:behaviou?r|result)/im],
  ['actual', 'Actual behavior', /^#{1,6}\s*actual (?:behaviou?r|result)/im],
  ['version', 'Version', /version[:：]\s*\S/i],
];

export function detectIssueSections(issueContent: string): IssueSection[] {
  return SECTION_PATTERNS.filter(([, , pattern]) => pattern.test(issueContent)).map(([section]) => section);
}

const parseErrorSchema = z.object({
  issue_content: z.string(),
});

export class ParseErrorFromIssueTool extends BaseTool<typeof parseErrorSchema> {
  readonly definition: ToolDefinition = {
    name: 'parse_error_from_issue',
    description: 'Analyze an issue body: stack trace details plus which template sections (environment, steps to reproduce, expected, actual, version) are present.',
    parameters: {
      type: 'object',
      properties: {
        issue_content: { type: 'string', description: 'The issue body text' },
      },
      required: ['issue_content'],
    },
  };

  protected readonly schema = parseErrorSchema;

  protected async executeInternal(args: z.infer<typeof parseErrorSchema>): Promise<string> {
    const found = new Set(detectIssueSections(args.issue_content));
    const output = [
      '# Issue Error Analysis',
      '',
      formatStackTraceAnalysis(analyzeStackTrace(args.issue_content)),
      '',
      '## Issue Structure',
    ];

    if (found.size === 0) {
      output.push('- No standard issue template sections found');
    } else {
      for (const [section, label] of SECTION_PATTERNS) {
        output.push(`- ${label}: ${found.has(section) ? 'found' : 'missing'}`);
      }
    }

    return output.join('\n');
  }
}
