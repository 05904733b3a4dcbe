/**
 * Test utilities barrel.
 */

export { createPipelineSteps, createStepConfig } from './fixtures/step-fixtures.ts';
export { createFakeChild, type FakeChild } from './mocks/fake-child.ts';
