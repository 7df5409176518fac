import { InboundCallbackEvent, InboundTextEvent, Reply } from '../types/transport.js';
import { AdminGuard, CommandRateGuard } from '../middleware/security.js';
import { logger } from '../middleware/logging.js';
import { AuthorizationError } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';
import { DownloadController } from '../controllers/downloadController.js';
import { OrganizeController } from '../controllers/organizeController.js';
import { AdminController } from '../controllers/adminController.js';

type Handler = (userId: number, argument: string) => Promise<Reply | null> | Reply | null;

interface Route {
  admin: boolean;
  handler: Handler;
}

export interface ChatControllers {
  downloads: DownloadController;
  organize: OrganizeController;
  admin: AdminController;
}

export interface ChatGuards {
  admin: AdminGuard;
  /** applies to slash commands; button presses and dialog replies are not counted */
  rate: CommandRateGuard;
}

export interface ChatRouter {
  /** null when the text needs no answer */
  handleText(event: InboundTextEvent): Promise<Reply | null>;
  handleCallback(event: InboundCallbackEvent): Promise<Reply | null>;
}

const INVALID_REQUEST: Reply = { text: 'Invalid request.' };

/** `/cmd`, `/cmd@botname` and an optional argument */
const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\S+)?(?:\s+(.*))?$/is;

function withId(run: (userId: number, id: number) => Promise<Reply> | Reply): Handler {
  return (userId, argument) => {
    if (!/^\d+$/.test(argument)) {
      return INVALID_REQUEST;
    }
    return run(userId, parseInt(argument, 10));
  };
}

/** `<id>:<offset>` */
function withIdAndOffset(run: (id: number, offset: number) => Promise<Reply> | Reply): Handler {
  return (_userId, argument) => {
    const match = /^(\d+):(\d+)$/.exec(argument);
    if (!match?.[1] || !match[2]) {
      return INVALID_REQUEST;
    }
    return run(parseInt(match[1], 10), parseInt(match[2], 10));
  };
}

function pageArgument(argument: string): number {
  return /^\d+$/.test(argument) ? parseInt(argument, 10) : 1;
}

export const createChatRouter = (guards: ChatGuards, controllers: ChatControllers): ChatRouter => {
  const { downloads, organize, admin } = controllers;
  const guard = guards.admin;

  const commands = new Map<string, Route>(Object.entries({
    start: { admin: false, handler: userId => downloads.help(userId) },
    help: { admin: false, handler: userId => downloads.help(userId) },
    queue: { admin: false, handler: (_userId, argument) => downloads.queue(pageArgument(argument)) },
    stats: { admin: false, handler: userId => downloads.stats(userId) },
    test: { admin: false, handler: () => downloads.test() },
    cancel: { admin: false, handler: userId => organize.cancel(userId) },
    organize: { admin: true, handler: userId => organize.organize(userId) },
    propagate: { admin: true, handler: userId => organize.propagate(userId) },
    organized: { admin: true, handler: () => admin.organized(0) },
    history: { admin: true, handler: () => admin.history(0) },
    users: { admin: true, handler: () => admin.users() },
    shutdown: { admin: true, handler: () => admin.shutdown() },
  } satisfies Record<string, Route>));

  const callbacks = new Map<string, Route>(Object.entries({
    cancel: { admin: false, handler: withId((userId, id) => downloads.cancelDownload(userId, id)) },
    queue: { admin: false, handler: withId((_userId, page) => downloads.queue(page)) },
    org_file: { admin: true, handler: (userId, key) => organize.selectFile(userId, key) },
    org_cat: { admin: true, handler: (userId, choice) => organize.chooseCategory(userId, choice) },
    bulk: {
      admin: true,
      handler: (userId, answer) =>
        answer === 'yes' || answer === 'no' ? organize.bulkAnswer(userId, answer) : INVALID_REQUEST,
    },
    org_page: { admin: true, handler: withId((_userId, offset) => admin.organized(offset)) },
    delorg: { admin: true, handler: withId((_userId, id) => admin.deleteRecord(id)) },
    reorg: { admin: true, handler: withId((userId, id) => admin.reorganize(userId, id)) },
    hist_page: { admin: true, handler: withId((_userId, offset) => admin.history(offset)) },
    hist_detail: { admin: true, handler: withIdAndOffset((id, offset) => admin.historyDetail(id, offset)) },
  } satisfies Record<string, Route>));

  const dispatch = async (
    route: Route | undefined,
    name: string,
    userId: number,
    argument: string
  ): Promise<Reply | null> => {
    if (!route) {
      return { text: 'Unknown command. Send /help for the list.' };
    }
    try {
      if (route.admin) {
        guard.assertAdmin(userId, name);
      }
      return await route.handler(userId, argument);
    } catch (error) {
      if (error instanceof AuthorizationError) {
        return { text: 'This command is for admins only.' };
      }
      logger.error('[ChatRouter] Handler failed', {
        service: 'ChatRouter',
        operation: name,
        userId,
        error: getErrorMessage(error),
      });
      return { text: `Something went wrong: ${getErrorMessage(error)}` };
    }
  };

  return {
    handleText: async event => {
      const text = event.text.trim();
      const command = COMMAND_PATTERN.exec(text);
      if (command?.[1]) {
        const name = command[1].toLowerCase();
        const route = commands.get(name);
        if (route) {
          const check = guards.rate.check(event.userId);
          if (!check.allowed) {
            const reset = check.resetSeconds > 0 ? ` (resets in ${check.resetSeconds}s)` : '';
            return { text: `Rate limit exceeded. Please wait.${reset}` };
          }
        }
        return dispatch(route, name, event.userId, command[2]?.trim() ?? '');
      }

      // Free text only matters to an admin with an open organize dialog
      if (!guard.isAdmin(event.userId)) {
        return null;
      }
      return dispatch({ admin: true, handler: organize.text }, 'organize_text', event.userId, text);
    },

    handleCallback: async event => {
      const separator = event.data.indexOf(':');
      const prefix = separator === -1 ? event.data : event.data.slice(0, separator);
      const argument = separator === -1 ? '' : event.data.slice(separator + 1);
      return dispatch(callbacks.get(prefix), prefix, event.userId, argument);
    },
  };
};
