import type { Questioner } from './matrix-input';

/**
 * Questioner that replays queued answers and records every query
 */
export function createQuestioner(answers: string[]): {
  questioner: Questioner;
  queries: string[];
} {
  const queue = [...answers];
  const queries: string[] = [];

  const questioner: Questioner = {
    question: async (query) => {
      queries.push(query);
      const answer = queue.shift();
      if (answer === undefined) {
        throw new Error(`No answer queued for '${query}'`);
      }
      return answer;
    },
  };

  return { questioner, queries };
}
