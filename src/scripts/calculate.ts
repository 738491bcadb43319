import 'dotenv/config';

import { resolveAppConfig } from '../config/environment';
import { createServices } from '../services/createServices';
import { parsePositiveInteger } from '../utils/requestParsing';
import { serializeCalculation } from '../utils/serializeCalculation';

/**
 * CLI entrypoint: print one batch calculation as JSON.
 *
 * Usage: calculate <servings> <gramsPerServing>
 */
const run = async (): Promise<void> => {
  const [rawServings, rawGramsPerServing] = process.argv.slice(2);
  const servings = parsePositiveInteger(rawServings);
  const gramsPerServing = parsePositiveInteger(rawGramsPerServing);
  if (servings === null || gramsPerServing === null) {
    console.error('Usage: calculate <servings> <gramsPerServing> (both positive integers)');
    process.exitCode = 2;
    return;
  }

  const { calculator } = await createServices(resolveAppConfig());
  const result = await calculator.calculate(servings, gramsPerServing);
  console.log(JSON.stringify(serializeCalculation(result), null, 2));
};

run().catch((error) => {
  console.error('Calculation failed:', error);
  process.exitCode = 1;
});
