export { FakeRunner } from "./fake-runner";
export type { RecordedCall } from "./fake-runner";
