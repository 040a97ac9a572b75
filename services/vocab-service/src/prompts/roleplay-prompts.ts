export interface RoleplayScenario {
  id: string;
  name: string;
  description: string;
  character: string;
  setting: string;
}

export const RESTAURANT_SCENARIO: RoleplayScenario = {
  id: 'restaurant',
  name: 'Restaurant',
  description: 'Ordering food at a restaurant',
  character: 'waiter/waitress',
  setting: 'restaurant'
};

export const DIRECTIONS_SCENARIO: RoleplayScenario = {
  id: 'directions',
  name: 'Asking for Directions',
  description: 'Asking for directions in a city',
  character: 'local resident',
  setting: 'street'
};

export const PARTY_SCENARIO: RoleplayScenario = {
  id: 'party',
  name: 'Social Party',
  description: 'Making small talk at a party',
  character: 'party guest',
  setting: 'party'
};

export const JOB_INTERVIEW_SCENARIO: RoleplayScenario = {
  id: 'job-interview',
  name: 'Job Interview',
  description: 'Answering questions in a job interview',
  character: 'interviewer',
  setting: 'office'
};

export const HOTEL_SCENARIO: RoleplayScenario = {
  id: 'hotel',
  name: 'Hotel Check-in',
  description: 'Checking in at a hotel',
  character: 'hotel receptionist',
  setting: 'hotel lobby'
};

export const SHOPPING_SCENARIO: RoleplayScenario = {
  id: 'shopping',
  name: 'Shopping',
  description: 'Buying clothes or other items in a store',
  character: 'shop assistant',
  setting: 'store'
};

export const TAXI_SCENARIO: RoleplayScenario = {
  id: 'taxi',
  name: 'Taking a Taxi',
  description: 'Giving a destination and chatting with the driver',
  character: 'taxi driver',
  setting: 'taxi'
};

export const DOCTOR_SCENARIO: RoleplayScenario = {
  id: 'doctor',
  name: "Doctor's Appointment",
  description: 'Describing symptoms to a doctor',
  character: 'doctor',
  setting: 'clinic'
};

export const ROLEPLAY_SCENARIOS: Record<string, RoleplayScenario> = {
  [RESTAURANT_SCENARIO.id]: RESTAURANT_SCENARIO,
  [DIRECTIONS_SCENARIO.id]: DIRECTIONS_SCENARIO,
  [PARTY_SCENARIO.id]: PARTY_SCENARIO,
  [JOB_INTERVIEW_SCENARIO.id]: JOB_INTERVIEW_SCENARIO,
  [HOTEL_SCENARIO.id]: HOTEL_SCENARIO,
  [SHOPPING_SCENARIO.id]: SHOPPING_SCENARIO,
  [TAXI_SCENARIO.id]: TAXI_SCENARIO,
  [DOCTOR_SCENARIO.id]: DOCTOR_SCENARIO
};

// Fallbacks for a scenario the learner describes in their own words
export const CUSTOM_CHARACTER = 'appropriate role';
export const CUSTOM_SETTING = 'relevant location';

// Lower-cased replies that end the scene
export const STOP_WORDS = ['stop', 'stop.', 'arrêt', 'alto', 'halt', 'stopp'];

// Phrases that mark a reply as correcting the learner
export const CORRECTION_MARKERS = [
  'correct',
  'should',
  'try again',
  'instead',
  'correcto',
  'deberías',
  'korrekt',
  'solltest',
  'essayer'
];

export function buildRoleplaySystemPrompt(scenario: RoleplayScenario, language: string): string {
  return `You are a ${scenario.character} in a ${scenario.setting}. The user wants to practice ${language} conversation in this scenario: ${scenario.description}.

Important rules:
1. ONLY speak in ${language}. Never use any other language.
2. Stay in character as a ${scenario.character} throughout the conversation.
3. Start by introducing yourself with a name and your role.
4. Ask an opening question to begin the scenario.
5. Keep your replies short and conversational.
6. If the user makes a mistake, correct it politely and ask them to try again.`;
}

export function buildRoleplayTurnInstruction(scenario: RoleplayScenario, language: string): string {
  return `Continue the roleplay as a ${scenario.character}. Evaluate the user's response. If it contains a mistake, correct it and ask them to try again. Otherwise reply naturally and move the conversation forward. Remember: ONLY speak in ${language}.`;
}

export function buildRoleplayRetryInstruction(scenario: RoleplayScenario, language: string): string {
  return `The user was supposed to say the phrase you corrected in your last message. If their answer is now correct, praise them briefly and continue the roleplay as a ${scenario.character}. If still incorrect, provide encouragement and the correct answer again, then ask them to repeat it. Remember: ONLY speak in ${language}.`;
}

export const TRANSLATOR_SYSTEM_PROMPT =
  'You are a professional translator. Translate the given text to English accurately and naturally. Respond only with the English translation, no explanations or additional text.';

export function buildTranslationPrompt(text: string, sourceLanguage: string): string {
  return `Translate this ${sourceLanguage} text to English: ${text}`;
}
