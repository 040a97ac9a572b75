import { ChatMessage, InferenceGateway } from '../clients/inference-gateway';
import {
  buildRoleplayRetryInstruction,
  buildRoleplaySystemPrompt,
  buildRoleplayTurnInstruction,
  CORRECTION_MARKERS,
  CUSTOM_CHARACTER,
  CUSTOM_SETTING,
  ROLEPLAY_SCENARIOS,
  RoleplayScenario,
  STOP_WORDS
} from '../prompts/roleplay-prompts';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CustomScenario {
  description: string;
  character?: string;
  setting?: string;
}

export interface RoleplayOptions {
  model?: string;
  signal?: AbortSignal;
}

export interface RoleplayTurn {
  reply: string | null;
  // The reply reads as a correction of the learner's last line
  correction: boolean;
  ended: boolean;
}

export function isStopWord(text: string): boolean {
  return STOP_WORDS.includes(text.trim().toLowerCase());
}

export function looksLikeCorrection(text: string): boolean {
  const lowered = text.toLowerCase();
  return CORRECTION_MARKERS.some(marker => lowered.includes(marker));
}

/**
 * Roleplay Service
 * Scenario conversations with the model in character. The caller keeps the
 * transcript and sends it back each turn.
 */
export class RoleplayService {
  private gateway: InferenceGateway;

  constructor(gateway: InferenceGateway) {
    this.gateway = gateway;
  }

  listScenarios(): RoleplayScenario[] {
    return Object.values(ROLEPLAY_SCENARIOS);
  }

  resolveScenario(scenarioId?: string, custom?: CustomScenario): RoleplayScenario {
    if (scenarioId) {
      if (!Object.prototype.hasOwnProperty.call(ROLEPLAY_SCENARIOS, scenarioId)) {
        throw new NotFoundError('Roleplay scenario', { scenarioId });
      }
      return ROLEPLAY_SCENARIOS[scenarioId];
    }
    if (custom) {
      return {
        id: 'custom',
        name: 'Custom',
        description: custom.description,
        character: custom.character || CUSTOM_CHARACTER,
        setting: custom.setting || CUSTOM_SETTING
      };
    }
    throw new ValidationError('Either a scenario id or a custom scenario is required', 'scenarioId');
  }

  /**
   * First line of the scene: the character introduces themselves and asks
   * an opening question.
   */
  async open(language: string, scenario: RoleplayScenario, options: RoleplayOptions = {}): Promise<RoleplayTurn> {
    const reply = await this.gateway.chat([], {
      system: buildRoleplaySystemPrompt(scenario, language),
      targetLanguage: language,
      model: options.model,
      signal: options.signal
    });

    logger.info('[ROLEPLAY] Scene opened', { scenario: scenario.id, language });
    return { reply, correction: false, ended: false };
  }

  async respond(
    language: string,
    scenario: RoleplayScenario,
    history: ChatMessage[],
    options: RoleplayOptions = {}
  ): Promise<RoleplayTurn> {
    const last = history[history.length - 1];
    if (!last || last.role !== 'user') {
      throw new ValidationError('The last message must come from the user', 'messages');
    }

    if (isStopWord(last.content)) {
      logger.info('[ROLEPLAY] Scene ended by the user', { scenario: scenario.id, language });
      return { reply: null, correction: false, ended: true };
    }

    const previous = history.slice(0, -1).reverse().find(message => message.role === 'assistant');
    const instruction = previous && looksLikeCorrection(previous.content)
      ? buildRoleplayRetryInstruction(scenario, language)
      : buildRoleplayTurnInstruction(scenario, language);

    const reply = await this.gateway.chat([...history, { role: 'system', content: instruction }], {
      system: buildRoleplaySystemPrompt(scenario, language),
      targetLanguage: language,
      model: options.model,
      signal: options.signal
    });

    return { reply, correction: looksLikeCorrection(reply), ended: false };
  }
}
