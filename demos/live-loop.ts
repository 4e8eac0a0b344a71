// demos/live-loop.ts
// Run with `npm run demo`, then edit the lines marked below while it runs.
// Break the syntax on purpose to see the recovery prompt; fix it and press return.

import { reloading } from "../src/index";

function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

const history: number[] = [];
const state = { total: 0, history };

const describeTotal = reloading(
  function describeTotal(total: number) {
    return `running total: ${total}`; // edit me
  },
  { scope: { state } }
);

for (const step of reloading({ forever: true, scope: { state, sleep, describeTotal } })) {
  state.total += step; // edit me
  state.history.push(step);
  console.log(describeTotal(state.total));
  sleep(1000);
}
