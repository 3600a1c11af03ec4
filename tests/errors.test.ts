import { DeployError, errorHint, errorReport, RiftError } from '../src/runtime/errors';

describe('errorReport()', () => {
  it('should list every failed deployment target', () => {
    const error = new DeployError([
      new RiftError('DeployConfigMissing', "ethereum deployment requires 'api_key'", { target: 'ethereum', key: 'api_key' }),
      new RiftError('DeployFailed', 'aws failed after 4 attempts: bucket not found', { target: 'aws', attempts: 4 }),
    ]);

    expect(errorReport(error)).toEqual([
      'Error: DeployFailed: 2 deployment target(s) failed: ethereum, aws',
      "  - DeployConfigMissing: ethereum deployment requires 'api_key'",
      '  - DeployFailed: aws failed after 4 attempts: bucket not found',
    ]);
  });

  it('should include captured stderr and a hint', () => {
    const error = new RiftError('UnsupportedLanguage', "Unsupported language 'cobol'", { stderr: 'no grammar\n' });
    expect(errorReport(error)).toEqual([
      "Error: UnsupportedLanguage: Unsupported language 'cobol'",
      'no grammar',
      'Hint: Supported languages are: python, javascript, go, java, cpp, php, rust',
    ]);
  });

  it('should print plain errors as their message', () => {
    expect(errorReport(new Error('boom'))).toEqual(['Error: boom']);
    expect(errorReport('text')).toEqual(['Error: text']);
  });
});

describe('errorHint()', () => {
  it('should only hint at errors the user can fix by retyping', () => {
    expect(errorHint(new RiftError('ParseError', 'x'))).toBe("Check syntax. Use 'help' for examples");
    expect(errorHint(new RiftError('ExecutionFailed', 'x'))).toBeUndefined();
  });
});
