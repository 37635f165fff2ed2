import { z } from 'zod';
import {
  ErrorCodes,
  ResponseError,
  type Connection,
  type ExecuteCommandParams,
} from 'vscode-languageserver/node.js';
import type { LoadWarning } from '../types/index.js';
import { isAddress } from '../extract/index.js';
import { errorMessage, logger, toFileUri } from '../utils/index.js';
import { CREATE_CONTACT_COMMAND, RELOAD_CONTACTS_COMMAND, type ServerContext } from './context.js';
import { publishAllDiagnostics } from './diagnostics.js';
import { guardAsync } from './errors.js';

const createContactArgs = z.object({
  address: z.string().trim().refine(isAddress, 'must be an email address'),
  name: z.string().optional(),
});

/** Side effects a command has on the client. */
export interface CommandEffects {
  showDocument(uri: string): Promise<void>;
  republish(): Promise<void>;
}

export interface ReloadSummary {
  generation: number;
  contacts: number;
  addresses: number;
  warnings: LoadWarning[];
}

export interface CreateSummary {
  uri: string;
  path: string;
}

export async function handleExecuteCommand(
  ctx: ServerContext,
  params: ExecuteCommandParams,
  effects: CommandEffects,
): Promise<ReloadSummary | CreateSummary> {
  switch (params.command) {
    case RELOAD_CONTACTS_COMMAND: {
      const outcome = await ctx.store.reload();
      await effects.republish();
      return outcome;
    }
    case CREATE_CONTACT_COMMAND: {
      const parsed = createContactArgs.safeParse(params.arguments?.[0]);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
        throw new ResponseError(ErrorCodes.InvalidParams, `Invalid ${CREATE_CONTACT_COMMAND} arguments: ${issues}`);
      }
      const created = await ctx.store.createContact(parsed.data);
      await effects.republish();
      const uri = toFileUri(created.path);
      await effects.showDocument(uri);
      return { uri, path: created.path };
    }
    default:
      throw new ResponseError(ErrorCodes.InvalidParams, `Unknown command: ${params.command}`);
  }
}

export function registerCommandHandlers(connection: Connection, ctx: ServerContext): void {
  const effects: CommandEffects = {
    async showDocument(uri) {
      try {
        await connection.window.showDocument({ uri, takeFocus: true });
      } catch (err) {
        logger.warn('Client could not open', uri, errorMessage(err));
      }
    },
    republish: () => publishAllDiagnostics(connection, ctx),
  };
  connection.onExecuteCommand(params => guardAsync(() => handleExecuteCommand(ctx, params, effects)));
}
