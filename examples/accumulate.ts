import {
  CompletionQueue,
  InferInput,
  InferRequestedOutput,
  InferenceServerError,
  withClient,
  type InferResult,
} from "../src/index.js";

// Stream one sequence to simple_sequence and print the running sums.
// Usage: tsx examples/accumulate.ts [host:port] 3 4 5

const url = process.argv[2] ?? "localhost:8001";
const values = process.argv.slice(3).map(Number);
if (values.length === 0) values.push(1, 2, 3);

const queue = new CompletionQueue<InferResult | InferenceServerError>();

await withClient({ url }, async (client) => {
  client.startStream({
    callback: (result, error) => {
      if (error) queue.put(error);
      else if (result) queue.put(result);
    },
  });

  values.forEach((value, i) => {
    const input = new InferInput("INPUT", [1, 1], "INT32").setData([value]);
    client.asyncStreamInfer({
      modelName: "simple_sequence",
      inputs: [input],
      outputs: [new InferRequestedOutput("OUTPUT")],
      requestId: `42_${i + 1}`,
      sequenceId: 42,
      sequenceStart: i === 0,
      sequenceEnd: i === values.length - 1,
    });
  });

  for (let i = 0; i < values.length; i++) {
    const item = await queue.get(5_000);
    if (item instanceof InferenceServerError) throw item;
    console.log(`${item.id}: ${item.asArray("OUTPUT")?.join(", ")}`);
  }
});
