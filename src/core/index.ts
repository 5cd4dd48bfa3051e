/**
 * Graphform Core Module
 * Tree-shakable exports for the orchestration engine
 */

// Engine facade
export { GraphformEngine } from './engine';
export type { EngineArgs, PreparedConfiguration } from './engine';

// Declarations and modules
export { parseModuleDeclaration } from './declaration/parser';
export type { ModuleDeclaration, ResourceDeclaration, ModuleCallDeclaration, OutputDeclaration, VariableDeclaration } from './declaration/parser';
export { LocalModuleLoader, isLocalSource } from './declaration/loader';
export type { ModuleSourceLoader } from './declaration/loader';
export { ModuleExpander } from './module/expander';
export type { ExpandedConfiguration, ExpandedOutput, ModuleTree } from './module/expander';

// Attribute graph
export { UNKNOWN, UnknownValue, parseValue, parseString, parseReference, evaluate, collectReferences } from './graph/expression';
export type { Expression, LiteralValue, AttributeMap, PlannedValue, Reference } from './graph/expression';
export { deposedAddress, formatAddress, parseAddress } from './graph/address';
export type { NodeIdentity } from './graph/address';
export { AttributeGraph, DEFAULT_LIFECYCLE } from './graph/graph';
export type { GraphNode, LifecyclePolicy, NodeDeclaration, ProvisionerSpec } from './graph/graph';
export { DependencyResolver, topologicalOrder } from './graph/resolver';
export type { ResolvedGraph } from './graph/resolver';

// Plan and apply
export { Planner } from './plan/planner';
export { planSteps, summarizePlan, hasChanges } from './plan/plan';
export type { Plan, PlannedChange, PlannedAction, PlanStep, PlanSummary, PlanMode } from './plan/plan';
export { ApplyExecutor, applySucceeded } from './apply/executor';
export type { ApplyReport, ApplyEvent, ApplyOptions, NodeReport, NodeStatus } from './apply/executor';

// Providers
export { ProviderRegistry, providerNameOf } from './provider';
export type { ResourceProvider, ProviderResult } from './provider';

// Remote provisioning
export { RemoteProvisionerRunner, resolveConnection } from './provisioner/runner';
export type { ProvisionerState, ProvisionerRunReport, ProvisionerRunRequest } from './provisioner/runner';
export { RemoteAuthenticationError } from './provisioner/remote';
export type { RemoteExecutor, RemoteTarget, RemoteCredentials, RemoteRunResult } from './provisioner/remote';
export { SshRemoteExecutor, buildSshCommand } from './provisioner/ssh';

// State management
export { LocalStateStore, AbstractStateStore, emptyState } from './state';
export type { StateStore, StateRecord, StateSnapshot, StateOutput } from './state';

// Configuration
export { ConfigLoader, DEFAULT_CORE_CONFIG } from './config';
export type { EngineConfig } from './config';

// Constants
export { GRAPHFORM_VERSION } from './const';
