import { SequenceInferenceServer } from "../src/index.js";

// Serve simple_sequence, simple_dyna_sequence and simple_string_dyna_sequence.
// Usage: tsx examples/sequence-server.ts [host:port]

const address = process.argv[2] ?? "0.0.0.0:8001";

const server = new SequenceInferenceServer({
  onLog: (msg) => console.error(`[${msg.level}] ${msg.message}`),
});
const port = await server.listen(address);
console.log(`PORT:${port}`);

process.once("SIGINT", () => server.forceShutdown());
