/**
 * Tool registry: the static set of operations, their argument schemas and
 * descriptions.
 *
 * `parseInvocation` turns a raw `{name, arguments}` pair into the tagged
 * `ToolInvocation` union; the dispatcher never sees unvalidated input.
 */

import { z } from 'zod';
import { ELEMENT_CHECKS } from './engine.js';
import { InvalidArgumentError } from './errors.js';

const timeout = z
  .number()
  .int()
  .positive()
  .optional()
  .describe('Maximum time to wait in milliseconds (defaults to the server setting)');

const selector = z.string().min(1).describe('CSS selector of the target element');

export const FIELD_TYPES = ['text', 'checkbox', 'radio', 'select'] as const;

const formField = z.object({
  selector,
  value: z
    .union([z.string(), z.boolean()])
    .describe('Text to fill, option value to select, or checked state for checkbox/radio'),
  field_type: z
    .enum(FIELD_TYPES)
    .default('text')
    .describe('How to apply the value (default: text)'),
});

export type FormField = z.infer<typeof formField>;

const shapes = {
  launch_browser: {
    headless: z.boolean().optional().describe('Run without a visible window'),
    viewport_width: z.number().int().positive().optional().describe('Viewport width in pixels'),
    viewport_height: z.number().int().positive().optional().describe('Viewport height in pixels'),
  },
  close_browser: {},
  navigate_to: {
    url: z.string().min(1).describe('The URL to navigate to (include the scheme)'),
    wait_until: z
      .enum(['load', 'domcontentloaded', 'networkidle'])
      .default('load')
      .describe('When to consider navigation finished (default: load)'),
    timeout,
  },
  click_element: { selector, timeout },
  type_text: {
    selector,
    text: z.string().describe('Text to type, one key press per character'),
    delay: z.number().int().nonnegative().optional().describe('Delay between key presses in ms'),
    clear: z.boolean().default(false).describe('Clear the field before typing'),
    timeout,
  },
  fill_form: {
    fields: z.array(formField).min(1).describe('Fields to apply, in order'),
    timeout,
  },
  evaluate_javascript: {
    script: z.string().min(1).describe('JavaScript expression or function source to run in the page'),
  },
  get_console_logs: {
    level: z.enum(['log', 'warn', 'error', 'info']).optional().describe('Only return this level'),
    clear: z.boolean().default(false).describe('Empty the console log after reading'),
  },
  get_network_requests: {
    method: z.string().min(1).optional().describe('HTTP method to match exactly (case-insensitive)'),
    url_pattern: z.string().min(1).optional().describe('Substring the request URL must contain'),
    clear: z.boolean().default(false).describe('Empty the network log after reading'),
  },
  get_page_metrics: {},
  take_screenshot: {
    full_page: z.boolean().default(false).describe('Capture the full scrollable page'),
    save: z.boolean().default(false).describe('Also write the PNG to the screenshot directory'),
  },
  wait_for_selector: {
    selector,
    state: z
      .enum(['visible', 'hidden', 'attached', 'detached'])
      .default('visible')
      .describe('State to wait for (default: visible)'),
    timeout,
  },
  check_element_state: {
    selector,
    checks: z
      .array(z.enum(ELEMENT_CHECKS))
      .min(1)
      .optional()
      .describe('States to evaluate (default: all)'),
  },
  get_local_storage: {
    key: z.string().optional().describe('Only return this key'),
  },
  get_cookies: {
    name: z.string().optional().describe('Only return cookies with this name'),
  },
  get_page_content: {
    selector: selector.optional().describe('Scope the HTML to the first matching element'),
  },
  get_session_status: {},
} satisfies Record<string, z.ZodRawShape>;

export type ToolName = keyof typeof shapes;

export type ToolArgs<N extends ToolName> = z.infer<z.ZodObject<(typeof shapes)[N]>>;

export type ToolInvocation = {
  [N in ToolName]: { name: N; args: ToolArgs<N> };
}[ToolName];

export interface ToolDefinition {
  name: ToolName;
  description: string;
  shape: z.ZodRawShape;
}

const descriptions: Record<ToolName, string> = {
  launch_browser:
    'Launch a browser with one page. Console messages and network requests are recorded from this point on. Fails if a browser is already running.',
  close_browser: 'Close the browser and discard recorded logs. Safe to call when no browser is running.',
  navigate_to: 'Navigate the page to a URL and wait for it to load. Returns the final URL, title and HTTP status.',
  click_element: 'Click an element by CSS selector.',
  type_text: 'Type text into an element key by key, optionally clearing it first.',
  fill_form:
    'Fill several form fields in order (text inputs, checkboxes, radio buttons, selects). Stops at the first field that fails; earlier fields stay filled.',
  evaluate_javascript: 'Run JavaScript in the page context and return its JSON-serializable result.',
  get_console_logs: 'Return recorded console messages in emission order, optionally filtered by level.',
  get_network_requests:
    'Return recorded network requests with their status, optionally filtered by method and URL substring.',
  get_page_metrics: 'Return navigation and paint timing for the current page.',
  take_screenshot: 'Capture a PNG screenshot of the page.',
  wait_for_selector: 'Wait until an element reaches a state (visible, hidden, attached, detached) or the timeout elapses.',
  check_element_state: 'Evaluate boolean states (visible, enabled, checked, ...) of one element.',
  get_local_storage: 'Read localStorage of the current origin, optionally a single key.',
  get_cookies: 'Read cookies of the browser session, optionally filtered by name.',
  get_page_content: 'Return the page HTML, or the outer HTML of one element.',
  get_session_status: 'Report whether a browser is running, with its viewport, URL and recorded log sizes.',
};

const invocationSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('launch_browser'), args: z.object(shapes.launch_browser) }),
  z.object({ name: z.literal('close_browser'), args: z.object(shapes.close_browser) }),
  z.object({ name: z.literal('navigate_to'), args: z.object(shapes.navigate_to) }),
  z.object({ name: z.literal('click_element'), args: z.object(shapes.click_element) }),
  z.object({ name: z.literal('type_text'), args: z.object(shapes.type_text) }),
  z.object({ name: z.literal('fill_form'), args: z.object(shapes.fill_form) }),
  z.object({ name: z.literal('evaluate_javascript'), args: z.object(shapes.evaluate_javascript) }),
  z.object({ name: z.literal('get_console_logs'), args: z.object(shapes.get_console_logs) }),
  z.object({ name: z.literal('get_network_requests'), args: z.object(shapes.get_network_requests) }),
  z.object({ name: z.literal('get_page_metrics'), args: z.object(shapes.get_page_metrics) }),
  z.object({ name: z.literal('take_screenshot'), args: z.object(shapes.take_screenshot) }),
  z.object({ name: z.literal('wait_for_selector'), args: z.object(shapes.wait_for_selector) }),
  z.object({ name: z.literal('check_element_state'), args: z.object(shapes.check_element_state) }),
  z.object({ name: z.literal('get_local_storage'), args: z.object(shapes.get_local_storage) }),
  z.object({ name: z.literal('get_cookies'), args: z.object(shapes.get_cookies) }),
  z.object({ name: z.literal('get_page_content'), args: z.object(shapes.get_page_content) }),
  z.object({ name: z.literal('get_session_status'), args: z.object(shapes.get_session_status) }),
]);

export const TOOL_NAMES = Object.keys(shapes).filter(isToolName);

export const toolDefinitions: ToolDefinition[] = TOOL_NAMES.map((name) => ({
  name,
  description: descriptions[name],
  shape: shapes[name],
}));

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(shapes, name);
}

/**
 * Validate a raw invocation. Throws `InvalidArgumentError` for an unknown
 * tool or arguments that do not match its schema.
 */
export function parseInvocation(name: string, args: unknown): ToolInvocation {
  if (!isToolName(name)) {
    throw new InvalidArgumentError(`Unknown tool: ${name}`);
  }

  const parsed = invocationSchema.safeParse({ name, args: args ?? {} });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const path = issue.path.slice(1).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidArgumentError(`Invalid arguments for ${name}: ${problems.join('; ')}`, {
      details: { issues: problems },
    });
  }
  return parsed.data;
}
