// Prints orbit parameters for the fixed example; a smoke test without the HTTP layer
import { EXAMPLE_ECCENTRICITY, EXAMPLE_SEMI_MAJOR_AXIS, formatExampleReport } from './core/ExampleReport.js';

for (const line of formatExampleReport(EXAMPLE_SEMI_MAJOR_AXIS, EXAMPLE_ECCENTRICITY)) {
  console.log(line);
}
