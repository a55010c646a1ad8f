export * from "./cli";
export { PtrguardContext } from "./internals/context";
export {
  PtrguardConfig,
  PtrguardEnv,
  SuccessPolicyName,
  WorklistOrder,
} from "./internals/config";
export * from "./internals/diagnostics";
export { InternalException, ExecutionException } from "./internals/exceptions";
export * from "./internals/ir";
export {
  AnalysisPass,
  SuccessPolicy,
  SuccessPolicies,
  BuiltInPasses,
  getAllPasses,
  findBuiltInPass,
} from "./passes/pass";
export {
  UninitializedStorageAccess,
  findUninitializedAccesses,
} from "./passes/builtin/uninitializedStorageAccess";
export { PTRGUARD_VERSION } from "./version";
