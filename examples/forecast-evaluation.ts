/**
 * Example: Comparing EWMA and rolling-window forecasts with QLIKE
 *
 * Fits both estimators on an in-sample window, forecasts one step ahead
 * through the out-of-sample period, and scores the variance forecasts
 * against squared returns.
 *
 * Set EWMA_LAMBDA and ROLLING_WINDOW in the environment or a .env file
 * to override the model defaults.
 */

import * as dotenv from 'dotenv';
import {
  createVolatilityModel,
  meanQlike,
  DEFAULT_EWMA_LAMBDA,
  DEFAULT_ROLLING_WINDOW,
  VolatilityError,
  VolatilityModelSpec,
} from '../src';

dotenv.config();

const EWMA_LAMBDA = Number(process.env.EWMA_LAMBDA || DEFAULT_EWMA_LAMBDA);
const ROLLING_WINDOW = Number(process.env.ROLLING_WINDOW || DEFAULT_ROLLING_WINDOW);

// Assume returns arrive from your own data loader
declare const dailyReturns: number[];

function evaluate(spec: VolatilityModelSpec, returns: number[], inSample: number): number {
  const realized: number[] = [];
  const forecast: number[] = [];

  for (let t = inSample; t < returns.length; t++) {
    const model = createVolatilityModel(spec).fit(returns.slice(0, t));
    const [vol] = model.predict(1);
    forecast.push(vol * vol);
    realized.push(returns[t] * returns[t]);
  }

  return meanQlike(realized, forecast);
}

function main() {
  const inSample = Math.floor(dailyReturns.length / 2);

  const specs: VolatilityModelSpec[] = [
    { type: 'ewma', lambda: EWMA_LAMBDA },
    { type: 'rolling', window: ROLLING_WINDOW },
  ];

  console.log('=== ONE-STEP QLIKE ===');
  for (const spec of specs) {
    try {
      const loss = evaluate(spec, dailyReturns, inSample);
      console.log(`[${spec.type}] mean QLIKE: ${loss.toFixed(4)}`);
    } catch (error) {
      if (error instanceof VolatilityError) {
        console.error(`[${spec.type}] ${error.code}: ${error.message}`);
        continue;
      }
      throw error;
    }
  }
}

main();
