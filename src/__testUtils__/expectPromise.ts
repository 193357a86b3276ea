import { expect } from 'chai';

export function expectPromise(promise: Promise<unknown>) {
  return {
    async toResolveAs(value: unknown) {
      let resolvedValue: unknown;

      try {
        resolvedValue = await promise;
      } catch (error) {
        expect.fail(`promise threw unexpected error ${String(error)}`);
      }
      expect(resolvedValue).to.deep.equal(value);
    },
    async toRejectWith(message: string) {
      let caughtError: unknown;

      try {
        await promise;
        expect.fail('promise should have thrown but did not');
      } catch (error) {
        caughtError = error;
      }

      expect(caughtError).to.be.instanceOf(Error);
      expect(caughtError).to.have.property('message', message);
    },
  };
}
