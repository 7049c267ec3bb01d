import { sleep } from "../async";

describe("async utils", () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    describe("sleep", () => {
        it("resolves only after the requested delay", async () => {
            jest.useFakeTimers();
            const done = jest.fn();

            const pending = sleep(1000).then(done);

            await jest.advanceTimersByTimeAsync(999);
            expect(done).not.toHaveBeenCalled();

            await jest.advanceTimersByTimeAsync(1);
            await pending;
            expect(done).toHaveBeenCalledTimes(1);
        });

        it("treats negative delays as zero", async () => {
            jest.useFakeTimers();
            const done = jest.fn();

            const pending = sleep(-50).then(done);
            await jest.advanceTimersByTimeAsync(0);
            await pending;

            expect(done).toHaveBeenCalledTimes(1);
        });
    });
});
