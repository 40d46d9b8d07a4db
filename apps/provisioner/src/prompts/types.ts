import type { PrompterKind } from '@netmount/shared';

export interface ChoiceOption {
  /** Returned when chosen; also what the operator sees first */
  value: string;
  description?: string;
  selected?: boolean;
}

/**
 * Operator interaction. Every method resolves to an "empty" answer on
 * cancel (`[]`, `null`, `false`) instead of rejecting.
 */
export interface Prompter {
  readonly kind: Exclude<PrompterKind, 'auto'>;

  /** Multi-select; resolves to the chosen values in option order */
  choose(title: string, prompt: string, options: ChoiceOption[]): Promise<string[]>;

  promptText(title: string, defaultValue?: string): Promise<string | null>;

  promptSecret(title: string): Promise<string | null>;

  confirm(question: string): Promise<boolean>;

  message(title: string, text: string): Promise<void>;

  /** Release the terminal; called once when the run ends */
  close(): void;
}
