import chalk from 'chalk';
import { ValidationErrors } from '../resource-manager/utils/errors';

export const prettyValidationErrors = (error: ValidationErrors): void => {
  console.error(chalk.red(error.file ? `Invalid declaration in ${error.file.path}` : 'Invalid declaration'));
  for (const validation_error of error.errors) {
    let line = `  ${chalk.cyan(validation_error.path)}: ${validation_error.message}`;
    if (validation_error.value !== undefined) {
      line += chalk.gray(` (got ${JSON.stringify(validation_error.value)})`);
    }
    console.error(line);
  }
};
