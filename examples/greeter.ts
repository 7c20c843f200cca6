import { GrpcApp, defineMessage, types } from "../src/index.js";
import type { CallContext } from "../src/index.js";
import { z } from "zod";

const HelloRequest = defineMessage("HelloRequest", { name: z.string() });
const HelloReply = defineMessage("HelloReply", { message: z.string() });
const CountRequest = defineMessage("CountRequest", { name: z.string(), times: types.int32 });

const app = new GrpcApp({ name: "Greeter", proto: "protos/greeter.proto" });

app.unaryUnary(
  async function sayHello(request: z.output<typeof HelloRequest>) {
    return { message: `Hello ${request.name}` };
  },
  { request: HelloRequest, response: HelloReply, description: "Greets one caller" },
);

app.unaryStream(
  async function* countHello(request: z.output<typeof CountRequest>, context: CallContext) {
    for (let i = 0; i < request.times && context.isActive(); i++) {
      yield { message: `Hello ${request.name} ${i}` };
    }
  },
  { request: CountRequest, response: HelloReply },
);

app.streamUnary(
  async function greetAll(requests: AsyncIterable<z.output<typeof HelloRequest>>) {
    const names: string[] = [];
    for await (const request of requests) names.push(request.name);
    return { message: `Hello ${names.join(", ")}` };
  },
  { request: HelloRequest, response: HelloReply },
);

app.streamStream(
  async function* chat(requests: AsyncIterable<z.output<typeof HelloRequest>>) {
    for await (const request of requests) yield { message: `Hello ${request.name}` };
  },
  { request: HelloRequest, response: HelloReply },
);

app.on("startup", () => console.log("greeter ready"));
process.on("SIGINT", () => {
  app.stop().catch(e => console.error(e));
});

await app.start();
await app.awaitTermination();
