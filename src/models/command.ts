/**
 * Command Models
 *
 * Platform-neutral view of a slash command invocation, built by the
 * platform adapter and consumed by the command handler.
 */

/**
 * Option values by option name
 */
export type CommandOptions = Record<string, string | number | boolean | undefined>;

/**
 * Invoking member
 */
export interface CommandMember {
  user_id: string;
  role_names: string[];      // As displayed; compared case-insensitively
  is_admin: boolean;         // Administrator or manage-server permission
}

/**
 * Slash command invocation
 */
export interface CommandContext {
  request_id: string;
  command: string;
  tenant_id: string;
  channel_id: string;
  member: CommandMember;
  options: CommandOptions;
}

/**
 * Autocomplete request for a string option
 */
export interface AutocompleteContext {
  command: string;
  tenant_id: string;
  focused: string;
  value: string;
  options: CommandOptions;
}

export interface AutocompleteChoice {
  name: string;
  value: string;
}
