import {
  ErrorCategory,
  createKernelError,
  insufficientFundsError,
  notFoundError,
  permissionError,
  systemError,
  timeoutError,
  validationError,
} from '../../src/domain/errors';
import { failureResult, resultError, successResult, toWireResult } from '../../src/domain/results';

describe('Kernel error model', () => {
  test('createKernelError defaults retriable to false', () => {
    const error = createKernelError({ code: 'not_found', category: ErrorCategory.Resource, message: 'gone' });
    expect(error).toEqual({ code: 'not_found', category: ErrorCategory.Resource, message: 'gone', retriable: false });
  });

  test('each factory sets its category and retriability', () => {
    expect(validationError('no_op_edit', 'same').category).toBe(ErrorCategory.Validation);
    expect(permissionError('no').code).toBe('not_authorized');
    expect(notFoundError('Artifact', 'a1').message).toBe('Artifact not found: a1');
    expect(insufficientFundsError('alice', 10, 3).retriable).toBe(true);
    expect(timeoutError('x.run', 50).category).toBe(ErrorCategory.Execution);
    expect(systemError('boom', 'settlement_failed').retriable).toBe(true);
  });
});

describe('Action results', () => {
  test('success results omit empty resource maps', () => {
    const result = successResult('done', { data: { n: 1 }, resourcesConsumed: {} });
    expect(result).toEqual({ success: true, message: 'done', data: { n: 1 } });
  });

  test('failure results carry the error fields', () => {
    const result = failureResult(insufficientFundsError('bob', 5, 2));
    expect(result).toEqual({
      success: false,
      message: 'Insufficient scrip: bob has 2, needs 5',
      errorCode: 'insufficient_funds',
      errorCategory: ErrorCategory.Resource,
      retriable: true,
      errorDetails: { principalId: 'bob', required: 5, available: 2 },
    });
    expect(resultError(result)?.code).toBe('insufficient_funds');
  });

  test('wire form is snake_case without absent fields', () => {
    expect(toWireResult(successResult('ok', { resourcesConsumed: { scrip: 3 }, chargedTo: 'alice' }))).toEqual({
      success: true,
      message: 'ok',
      resources_consumed: { scrip: 3 },
      charged_to: 'alice',
    });
    expect(toWireResult(failureResult(permissionError('nope', 'not_owner')))).toEqual({
      success: false,
      message: 'nope',
      error_code: 'not_owner',
      error_category: 'permission',
      retriable: false,
    });
  });

  test('a success result has no recoverable error', () => {
    expect(resultError(successResult('fine'))).toBeUndefined();
  });
});
