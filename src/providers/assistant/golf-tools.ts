import { suggestClub, getWindConditions } from '../../services/golf-advice.js';
import type { AssistantTool } from './interface.js';

export const ASSISTANT_NAME = 'Ceddy Golf Assistant';

export const ASSISTANT_INSTRUCTIONS = [
  'You are Ceddy, an AI golf coach helping players during games.',
  'Suggest golf clubs, analyze environmental conditions, and give concise golf tips.',
  'Respond only when the player says "Hey Ceddy."',
].join('\n');

export const suggestClubTool: AssistantTool = {
  name: 'suggest_club',
  description: 'Suggest a golf club based on distance',
  parameters: {
    type: 'object',
    properties: {
      distance: {
        type: 'number',
        description: 'Distance in yards',
      },
    },
    required: ['distance'],
  },
  execute(args) {
    const distance = Number(args.distance);
    if (!Number.isFinite(distance)) {
      return { error: 'distance must be a number of yards' };
    }
    return suggestClub(distance);
  },
};

export const windConditionsTool: AssistantTool = {
  name: 'check_wind_conditions',
  description: 'Check current wind conditions',
  parameters: {
    type: 'object',
    properties: {},
  },
  execute() {
    return getWindConditions();
  },
};

export const golfTools: readonly AssistantTool[] = [suggestClubTool, windConditionsTool];
