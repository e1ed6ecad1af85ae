export { CheckoutUseCase } from './checkout.use-case';
export { runStep, type RunStepInput, type StepRunnerDeps } from './run-step';
