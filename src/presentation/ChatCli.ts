import * as readline from 'readline/promises';
import { SessionManager } from '../application/services/SessionManager.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { SamplingParams } from '../core/entities/ChatRequest.js';
import { ChatError } from '../core/errors.js';
import { SamplingSchema } from '../config.js';

export type CliCommand =
  | { type: 'prompt'; text: string }
  | { type: 'new'; systemMessage?: string; title?: string }
  | { type: 'list' }
  | { type: 'open'; chatId: number }
  | { type: 'rename'; chatId: number; title: string }
  | { type: 'delete'; chatId: number }
  | { type: 'reset' }
  | { type: 'model'; model: string }
  | { type: 'set'; name: string; param: keyof SamplingParams; value?: number }
  | { type: 'stats' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; reason: string };

export const HELP_TEXT = `Commands:
  /new [system message] [--title <title>]
                          start a new chat
  /list                   list saved chats, newest first
  /open <id>              switch to a saved chat
  /rename <id> <title>    rename a saved chat
  /delete <id>            delete a saved chat
  /reset                  forget the context of the current chat
  /model <name>           switch model
  /set <param> <value|off>
                          set or clear temperature, top_p,
                          presence_penalty or frequency_penalty
  /stats                  show storage statistics
  /help                   show this help
  /quit                   exit
Anything else is sent as a prompt.`;

const SAMPLING_PARAMS = new Map<string, keyof SamplingParams>([
  ['temperature', 'temperature'],
  ['top_p', 'topP'],
  ['presence_penalty', 'presencePenalty'],
  ['frequency_penalty', 'frequencyPenalty'],
]);

const SET_USAGE = 'Usage: /set <temperature|top_p|presence_penalty|frequency_penalty> <value|off>';

function parseSet(args: string[]): CliCommand {
  const [name, raw] = args;
  const param = SAMPLING_PARAMS.get(name ?? '');
  if (param === undefined || raw === undefined || args.length !== 2) {
    return { type: 'invalid', reason: SET_USAGE };
  }
  if (raw === 'off') {
    return { type: 'set', name, param };
  }

  const parsed = SamplingSchema.shape[param].safeParse(Number(raw));
  if (!parsed.success) {
    return { type: 'invalid', reason: `Invalid ${name}: ${parsed.error.issues[0].message}` };
  }
  return { type: 'set', name, param, value: parsed.data };
}

function parseNew(args: string[]): CliCommand {
  const titleAt = args.indexOf('--title');
  const systemMessage = (titleAt === -1 ? args : args.slice(0, titleAt)).join(' ');
  const title = titleAt === -1 ? '' : args.slice(titleAt + 1).join(' ');
  if (titleAt !== -1 && !title) {
    return { type: 'invalid', reason: 'Usage: /new [system message] [--title <title>]' };
  }
  return {
    type: 'new',
    ...(systemMessage ? { systemMessage } : {}),
    ...(title ? { title } : {}),
  };
}

function parseId(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
}

/**
 * Turn one input line into a command. Lines not starting with "/" are prompts.
 */
export function parseCommand(line: string): CliCommand {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) {
    return { type: 'prompt', text: line };
  }

  const [name, ...rest] = trimmed.slice(1).split(/\s+/);
  const argument = rest.join(' ');

  switch (name) {
    case 'new':
      return parseNew(rest);
    case 'list':
      return { type: 'list' };
    case 'open': {
      const chatId = parseId(rest[0]);
      return chatId === undefined
        ? { type: 'invalid', reason: 'Usage: /open <id>' }
        : { type: 'open', chatId };
    }
    case 'delete': {
      const chatId = parseId(rest[0]);
      return chatId === undefined
        ? { type: 'invalid', reason: 'Usage: /delete <id>' }
        : { type: 'delete', chatId };
    }
    case 'rename': {
      const chatId = parseId(rest[0]);
      const title = rest.slice(1).join(' ');
      if (chatId === undefined || !title) {
        return { type: 'invalid', reason: 'Usage: /rename <id> <title>' };
      }
      return { type: 'rename', chatId, title };
    }
    case 'reset':
      return { type: 'reset' };
    case 'model':
      return argument ? { type: 'model', model: argument } : { type: 'invalid', reason: 'Usage: /model <name>' };
    case 'set':
      return parseSet(rest);
    case 'stats':
      return { type: 'stats' };
    case 'help':
      return { type: 'help' };
    case 'quit':
    case 'exit':
      return { type: 'quit' };
    default:
      return { type: 'invalid', reason: `Unknown command "/${name}". Type /help for commands.` };
  }
}

/**
 * Interactive terminal front end for a SessionManager
 */
export class ChatCli {
  constructor(
    private manager: SessionManager,
    private connection: DatabaseConnection,
    private defaultSystemMessage: string,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.manager.addObserver({
      onWaiting: () => this.write('.'),
      onWaitFinished: () => this.write('\n'),
      onFragment: (fragment) => this.write(fragment),
      onCompletion: () => this.write('\n\n'),
      onTokensUsed: (tokens) => {
        const session = this.manager.activeSession;
        this.write(
          `>>> tokens used: ${tokens}/${this.manager.settings.maxTokens}` +
            ` | history: ${session.history.length} | context: ${session.context.length}\n`
        );
      },
      onChatPersisted: (chatId, title) => this.write(`>>> saved as chat ${chatId} "${title}"\n`),
    });
  }

  async run(input: NodeJS.ReadableStream = process.stdin): Promise<void> {
    const rl = readline.createInterface({ input, terminal: false });
    this.manager.newSession(this.defaultSystemMessage);
    this.write(`${HELP_TEXT}\n\n`);

    try {
      for await (const line of rl) {
        if (!line.trim()) {
          continue;
        }
        const keepGoing = await this.execute(parseCommand(line));
        if (!keepGoing) {
          break;
        }
      }
    } finally {
      rl.close();
    }
  }

  /**
   * Run one command. Returns false when the session should end.
   */
  async execute(command: CliCommand): Promise<boolean> {
    try {
      switch (command.type) {
        case 'prompt':
          await this.manager.generate(command.text);
          break;
        case 'new':
          this.manager.newSession(command.systemMessage ?? this.defaultSystemMessage, command.title);
          this.write('>>> new chat started\n');
          break;
        case 'list': {
          const chats = this.manager.listChats();
          this.write(
            chats.length === 0
              ? '>>> no saved chats\n'
              : chats.map((chat) => `${chat.id}\t${chat.title}`).join('\n') + '\n'
          );
          break;
        }
        case 'open': {
          const session = this.manager.setActive(command.chatId);
          this.write(`>>> opened "${session.title}" (${session.history.length} turns)\n`);
          break;
        }
        case 'rename':
          this.manager.rename(command.chatId, command.title);
          this.write(`>>> renamed chat ${command.chatId}\n`);
          break;
        case 'delete':
          this.manager.delete(command.chatId);
          this.write(`>>> deleted chat ${command.chatId}\n`);
          break;
        case 'reset':
          this.manager.activeSession.resetContext();
          this.write('>>> context has been reset\n');
          break;
        case 'model':
          this.manager.settings.model = command.model;
          this.write(`>>> model set to ${command.model}\n`);
          break;
        case 'set':
          if (command.value === undefined) {
            delete this.manager.settings[command.param];
            this.write(`>>> ${command.name} cleared\n`);
          } else {
            this.manager.settings[command.param] = command.value;
            this.write(`>>> ${command.name} set to ${command.value}\n`);
          }
          break;
        case 'stats': {
          const stats = this.connection.getStatistics();
          this.write(
            `>>> chats: ${stats.totalChats} | requests: ${stats.totalRequests}` +
              ` | messages: ${stats.totalMessages} | size: ${stats.databaseSize} bytes\n`
          );
          break;
        }
        case 'help':
          this.write(`${HELP_TEXT}\n`);
          break;
        case 'invalid':
          this.write(`>>> ${command.reason}\n`);
          break;
        case 'quit':
          this.write('>>> session ended\n');
          return false;
      }
    } catch (error) {
      if (!(error instanceof ChatError)) {
        throw error;
      }
      this.write(`\n>>> error: ${error.message}\n`);
    }
    return true;
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
