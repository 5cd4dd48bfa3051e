/**
 * Error taxonomy and engine error tests
 */

import { describe, it } from 'mocha';
import { expect } from 'chai';

import {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  GraphformError,
  extractErrorDetails,
  formatErrorMessage,
  isGraphformError,
  type ErrorCode
} from '../../../src/core/errors/taxonomy';
import {
  CyclicDependencyError,
  ENGINE_ERROR_CODES,
  PreventDestroyViolation,
  ProviderOperationError,
  ProvisionerFailure,
  UnknownReferenceError
} from '../../../src/core/errors/errors';

class TestError extends GraphformError {}

const TEST_CODE: ErrorCode = {
  code: 'TEST_001',
  category: ErrorCategory.PROVIDER,
  severity: ErrorSeverity.ERROR,
  devMessage: 'Provider call to {endpoint} failed',
  prodMessage: 'Provider call failed',
  suggestions: ['Retry later']
};

describe('Error taxonomy', () => {

  describe('Error code registry', () => {

    it('should register and retrieve error codes', () => {
      ErrorCodeRegistry.register(TEST_CODE);
      expect(ErrorCodeRegistry.get('TEST_001')).to.deep.equal(TEST_CODE);
    });

    it('should know every engine error code once errors are loaded', () => {
      for (const errorCode of Object.values(ENGINE_ERROR_CODES)) {
        expect(ErrorCodeRegistry.get(errorCode.code)).to.equal(errorCode);
      }
      const graphCodes = ErrorCodeRegistry.getByCategory(ErrorCategory.GRAPH).map(c => c.code);
      expect(graphCodes).to.include.members(['GF_GRAPH_001', 'GF_GRAPH_002', 'GF_GRAPH_003']);
    });

  });

  describe('Message templates', () => {

    it('should replace placeholders and join arrays', () => {
      expect(formatErrorMessage('{a} and {b}', { a: 1, b: ['x', 'y'] })).to.equal('1 and x, y');
    });

    it('should leave unknown placeholders untouched', () => {
      expect(formatErrorMessage('value {missing}', {})).to.equal('value {missing}');
    });

    it('should use production message in production environment', () => {
      const devError = new TestError(TEST_CODE, { endpoint: '/servers' });
      const prodError = new TestError(TEST_CODE, { endpoint: '/servers' }, undefined, ErrorEnvironment.PRODUCTION);

      expect(devError.message).to.equal('Provider call to /servers failed');
      expect(prodError.message).to.equal('Provider call failed');
    });

  });

  describe('Engine errors', () => {

    it('should render dependency cycle from first node back to itself', () => {
      const error = new CyclicDependencyError(['null_resource.a', 'null_resource.b']);
      expect(error.message).to.equal('Dependency cycle: null_resource.a -> null_resource.b -> null_resource.a');
      expect(error.cycle).to.deep.equal(['null_resource.a', 'null_resource.b']);
      expect(error.code).to.equal('GF_GRAPH_003');
      expect(error.name).to.equal('CyclicDependencyError');
    });

    it('should list every protected address', () => {
      const error = new PreventDestroyViolation(['local_file.a', 'local_file.b']);
      expect(error.message).to.equal('Plan would destroy nodes protected by prevent_destroy: local_file.a, local_file.b');
    });

    it('should name reference target and source', () => {
      const error = new UnknownReferenceError('var.location', 'null_resource.app');
      expect(error.message).to.equal('Reference to undeclared var.location from null_resource.app');
      expect(error.severity).to.equal(ErrorSeverity.CRITICAL);
    });

    it('should describe provisioner failure phase and attempts', () => {
      const error = new ProvisionerFailure('null_resource.app', 'connecting', 3, '', 'connect ECONNREFUSED');
      expect(error.message).to.equal('Provisioner for null_resource.app failed while connecting after 3 attempt(s): connect ECONNREFUSED');
      expect(error.category).to.equal(ErrorCategory.PROVISIONER);
    });

    it('should keep original error of provider failures', () => {
      const cause = new Error('quota exceeded');
      const error = new ProviderOperationError('local_file.a', 'create', cause.message, cause);
      expect(error.originalError).to.equal(cause);
      expect(error.toJSON().originalError).to.equal('quota exceeded');
      expect(error.toJSON().context).to.deep.equal({ address: 'local_file.a', operation: 'create', details: 'quota exceeded' });
    });

  });

  describe('Error details', () => {

    it('should hide context in production details', () => {
      ErrorCodeRegistry.register(TEST_CODE);
      const error = new TestError(TEST_CODE, { endpoint: '/servers' });

      expect(error.getDetails(ErrorEnvironment.PRODUCTION).context).to.deep.equal({});
      expect(error.getDetails().context).to.deep.equal({ endpoint: '/servers' });
      expect(error.getDetails().suggestions).to.deep.equal(['Retry later']);
    });

    it('should extract details from any thrown value', () => {
      const error = new TestError(TEST_CODE, { endpoint: '/servers' });

      expect(isGraphformError(error)).to.equal(true);
      expect(isGraphformError(new Error('plain'))).to.equal(false);
      expect(extractErrorDetails(error).code).to.equal('TEST_001');
      expect(extractErrorDetails('boom')).to.deep.equal({ message: 'boom', context: {} });
    });

  });

});
