import readline from "readline";

/**
 * Ask a free-text question. Returns the trimmed answer.
 */
export async function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(`${question}: `, (answer: string) => {
      resolve(answer.trim());
    });
  });
}

function parseNumber(answer: string): number | null {
  const value = Number(answer.replace(",", "."));
  return answer !== "" && Number.isFinite(value) ? value : null;
}

/**
 * Ask for a number, re-asking until the answer parses
 */
export async function askNumber(rl: readline.Interface, question: string): Promise<number> {
  for (;;) {
    const value = parseNumber(await ask(rl, question));
    if (value !== null) {
      return value;
    }
    console.log("Please enter a number");
  }
}

/**
 * Like askNumber, but an empty answer resolves to null
 */
export async function askOptionalNumber(rl: readline.Interface, question: string): Promise<number | null> {
  for (;;) {
    const answer = await ask(rl, question);
    if (answer === "") {
      return null;
    }
    const value = parseNumber(answer);
    if (value !== null) {
      return value;
    }
    console.log("Please enter a number, or leave empty");
  }
}

/**
 * Ask the user to choose from a menu of options
 */
export async function askMenu(
  rl: readline.Interface,
  options: string[],
  title = "What would you like to do?"
): Promise<number> {
  return new Promise((resolve) => {
    console.log(`${title}\n`);
    options.forEach((opt, i) => {
      console.log(`  ${i + 1}. ${opt}`);
    });
    console.log("");

    const askChoice = () => {
      rl.question("> ", (answer: string) => {
        const choice = parseInt(answer, 10);
        if (choice >= 1 && choice <= options.length) {
          resolve(choice);
        } else {
          console.log(`Please enter a number between 1 and ${options.length}`);
          askChoice();
        }
      });
    };
    askChoice();
  });
}

/**
 * Simple yes/no question
 */
export async function askYesNo(rl: readline.Interface, question: string): Promise<boolean> {
  return new Promise((resolve) => {
    rl.question(`${question} (yes/no): `, (answer) => {
      const lower = answer.toLowerCase().trim();
      resolve(lower === "yes" || lower === "y");
    });
  });
}
