/**
 * @squadline/runtime - Basic Example
 *
 * Demonstrates the runtime end to end:
 * - settings from the environment
 * - commands discovered from the extension point catalog
 * - a request-scoped service resolved per message
 * - tenant resolution and the message context
 *
 * The console transport reads one message per line from stdin, in the form
 * `<chat id> <text>`, and prints replies.
 */

import * as readline from 'readline';
import {
  ExtensionPointCatalog,
  MessageContext,
  createRuntime,
  loadSettings,
  type CommandCapability,
  type IChatTransport,
  type InboundMessageListener,
} from '../src';

// ==================== Console Transport ====================

class ConsoleTransport implements IChatTransport {
  readonly name = 'console';
  private listener?: InboundMessageListener;
  private input?: readline.Interface;
  private nextId = 1;

  onMessage(listener: InboundMessageListener): void {
    this.listener = listener;
  }

  async start(): Promise<void> {
    this.input = readline.createInterface({ input: process.stdin });
    this.input.on('line', (line) => {
      this.receive(line).catch((error: unknown) => console.error('Failed to handle line', error));
    });
  }

  async stop(): Promise<void> {
    this.input?.close();
  }

  async send(conversationId: string, text: string): Promise<void> {
    console.log(`[${conversationId}] ${text}`);
  }

  private async receive(line: string): Promise<void> {
    const [conversationId, ...words] = line.trim().split(/\s+/);
    if (!conversationId || !this.listener) return;

    const reply = await this.listener({
      id: `console-${this.nextId++}`,
      conversationId,
      senderId: 'console-user',
      text: words.join(' '),
      receivedAt: new Date(),
    });
    if (reply !== undefined) await this.send(conversationId, reply);
  }
}

// ==================== Services ====================

class AttendanceService {
  private readonly teamId = MessageContext.current().teamId;

  summary(): string {
    return `Attendance for ${this.teamId}: nobody has replied yet`;
  }
}

// ==================== Commands ====================

let runtimeRef: ReturnType<typeof createRuntime> | undefined;

const commands: CommandCapability[] = [
  {
    kind: 'command',
    name: '/team',
    description: 'Show the team this chat belongs to',
    handler: async (_args, context) => `This chat belongs to ${context.teamId}`,
  },
  {
    kind: 'command',
    name: '/attendance',
    description: 'Summarise replies for the next match',
    handler: async () => {
      const attendance = runtimeRef?.container.resolve(AttendanceService);
      return attendance?.summary() ?? 'Runtime is not ready';
    },
  },
];

// ==================== Main ====================

async function main(): Promise<void> {
  const runtime = createRuntime(loadSettings(), {
    name: 'basic-bot',
    catalog: new ExtensionPointCatalog().add('commands', 'basic', () => commands),
    transports: [new ConsoleTransport()],
    gracefulShutdown: true,
    configureServices: (container) => {
      container.addRequestScoped(AttendanceService);
    },
  });
  runtimeRef = runtime;

  await runtime.start();
  console.log('Type "<chat id> /team" to try it. Set DEFAULT_TEAM_ID or CHAT_TEAM_MAPPINGS first.');
}

main().catch((error: unknown) => {
  console.error('Failed to start', error);
  process.exit(1);
});
