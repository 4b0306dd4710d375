import * as readline from 'readline/promises';

export async function confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const hint = defaultAnswer ? '[Y/n]' : '[y/N]';
    const answer = (await rl.question(`${question} ${hint}: `)).trim().toLowerCase();
    if (answer === '') return defaultAnswer;
    return answer === 'y' || answer === 'yes';
  } finally {
    rl.close();
  }
}
