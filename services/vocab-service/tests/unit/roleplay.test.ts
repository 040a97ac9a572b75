import { ChatMessage } from '../../src/clients/inference-gateway';
import { buildRoleplaySystemPrompt, RESTAURANT_SCENARIO } from '../../src/prompts/roleplay-prompts';
import { isStopWord, looksLikeCorrection, RoleplayService } from '../../src/services/roleplay';
import { NotFoundError, ValidationError } from '../../src/utils/errors';
import { createFakeGateway } from '../support/fake-gateway';

describe('RoleplayService', () => {
  describe('scenarios', () => {
    it('should list the eight built-in scenes', () => {
      const service = new RoleplayService(createFakeGateway().gateway);

      const ids = service.listScenarios().map(scenario => scenario.id);

      expect(ids).toEqual(['restaurant', 'directions', 'party', 'job-interview', 'hotel', 'shopping', 'taxi', 'doctor']);
    });

    it('should fill in a role and place for a custom scene', () => {
      const service = new RoleplayService(createFakeGateway().gateway);

      const scenario = service.resolveScenario(undefined, { description: 'Renting a bicycle' });

      expect(scenario).toEqual({
        id: 'custom',
        name: 'Custom',
        description: 'Renting a bicycle',
        character: 'appropriate role',
        setting: 'relevant location'
      });
    });

    it('should reject an unknown scenario id', () => {
      const service = new RoleplayService(createFakeGateway().gateway);

      expect(() => service.resolveScenario('toString')).toThrow(NotFoundError);
      expect(() => service.resolveScenario()).toThrow(ValidationError);
    });
  });

  describe('open', () => {
    it('should ask the character to open the scene in the practice language', async () => {
      const fake = createFakeGateway();
      fake.chat.mockResolvedValueOnce('Buenas noches, soy Carlos. ¿Qué desea?');
      const service = new RoleplayService(fake.gateway);

      const turn = await service.open('spanish', RESTAURANT_SCENARIO);

      expect(turn).toEqual({ reply: 'Buenas noches, soy Carlos. ¿Qué desea?', correction: false, ended: false });
      const [messages, options] = fake.chat.mock.calls[0];
      expect(messages).toEqual([]);
      expect(options).toEqual(expect.objectContaining({
        system: buildRoleplaySystemPrompt(RESTAURANT_SCENARIO, 'spanish'),
        targetLanguage: 'spanish'
      }));
    });
  });

  describe('respond', () => {
    const opening: ChatMessage = { role: 'assistant', content: 'Hola, soy Carlos. ¿Qué desea?' };

    it('should end the scene on a stop word without calling the model', async () => {
      const fake = createFakeGateway();
      const service = new RoleplayService(fake.gateway);

      const turn = await service.respond('spanish', RESTAURANT_SCENARIO, [opening, { role: 'user', content: ' Alto ' }]);

      expect(turn).toEqual({ reply: null, correction: false, ended: true });
      expect(fake.chat).not.toHaveBeenCalled();
    });

    it('should append the turn instruction after the transcript', async () => {
      const fake = createFakeGateway();
      fake.chat.mockResolvedValueOnce('Muy bien, ¿algo de beber?');
      const service = new RoleplayService(fake.gateway);
      const history: ChatMessage[] = [opening, { role: 'user', content: 'Quiero una paella.' }];

      const turn = await service.respond('spanish', RESTAURANT_SCENARIO, history);

      expect(turn).toEqual({ reply: 'Muy bien, ¿algo de beber?', correction: false, ended: false });
      const [messages] = fake.chat.mock.calls[0];
      expect(messages.slice(0, 2)).toEqual(history);
      expect(messages[2].role).toBe('system');
      expect(messages[2].content).toMatch(/^Continue the roleplay as a waiter\/waitress\./);
    });

    it('should switch to the retry instruction after a correction and flag new corrections', async () => {
      const fake = createFakeGateway();
      fake.chat.mockResolvedValueOnce('Casi. Deberías decir "la cuenta". Try again.');
      const service = new RoleplayService(fake.gateway);
      const history: ChatMessage[] = [
        opening,
        { role: 'user', content: 'El cuenta, por favor.' },
        { role: 'assistant', content: 'You should say "la cuenta".' },
        { role: 'user', content: 'El cuenta.' }
      ];

      const turn = await service.respond('spanish', RESTAURANT_SCENARIO, history);

      expect(turn.correction).toBe(true);
      const [messages] = fake.chat.mock.calls[0];
      expect(messages[4].content).toMatch(/^The user was supposed to say/);
    });

    it('should require the learner to speak last', async () => {
      const service = new RoleplayService(createFakeGateway().gateway);

      await expect(service.respond('spanish', RESTAURANT_SCENARIO, [opening])).rejects.toThrow(ValidationError);
    });
  });

  describe('helpers', () => {
    it('should recognise stop words regardless of case and spacing', () => {
      expect(isStopWord('STOP.')).toBe(true);
      expect(isStopWord('stopp')).toBe(true);
      expect(isStopWord('stop please')).toBe(false);
    });

    it('should spot correction markers', () => {
      expect(looksLikeCorrection('Eso no es correcto.')).toBe(true);
      expect(looksLikeCorrection('Perfecto, gracias.')).toBe(false);
    });
  });
});
