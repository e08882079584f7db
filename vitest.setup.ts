import chalk from 'chalk';

// Assertions compare plain text; colour codes depend on the runner's TTY.
chalk.level = 0;
