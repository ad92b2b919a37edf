export const PACKAGE_NAME = "@quillgate/test-utils" as const;

export { InMemoryCredentials, InMemoryUsageStore } from "./fakes.js";
export {
  createMockResponse,
  hangUntilAborted,
  MockAdapter,
  type MockAdapterCall,
  type MockAdapterHandler,
  type MockAdapterStep,
} from "./mock-adapter.js";
