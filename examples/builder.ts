import { Builder } from '../src/index.js';

// Builder Example
// Uses a fixed port and an explicit target list instead of the VLOG variable.

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 8123;

async function main() {
    const server = await new Builder().port(PORT).addTarget('render').debug().start();
    console.log(`Viewer: http://127.0.0.1:${server.port}/`);
    await server.waitForConnection();

    for (let frame = 0; frame < 10; frame++) {
        server.clear('scene');
        server.emit('render', 'scene', `frame ${frame}`);
        server.emit('render::stats', 'stats', `objects: ${frame * 3}`);
        await new Promise((resolve) => setTimeout(resolve, 500));
    }
    server.shutdown();
}

main().catch((error: unknown) => {
    console.error('Builder example failed:', error);
    process.exitCode = 1;
});
