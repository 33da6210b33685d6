import { emit, init, waitForConnection } from '../src/index.js';

// Simple vlog Example
// Run with VLOG=solver to only see the "solver" targets, then open the printed URL.

async function main() {
    try {
        const port = await init();
        console.log(`Open http://127.0.0.1:${port}/ in a browser...`);
        await waitForConnection();

        for (let step = 0; step < 20; step++) {
            emit('solver', 'progress', `step ${step}`);
            emit('solver::residual', 'residual', `residual ${(1 / (step + 1)).toFixed(4)}`);
            emit('io', 'progress', 'hidden unless VLOG is empty or names "io"');
            await new Promise((resolve) => setTimeout(resolve, 250));
        }
    } catch (error) {
        console.error('Failed to start vlog:', error);
        process.exitCode = 1;
    }
}

void main();
