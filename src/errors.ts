/**
 * @file errors.ts
 * @description Error taxonomy. User input errors abort a command and are
 * reported; host rejections come from the kernel, the type checker or the
 * simplifier and propagate unchanged.
 */

export class UserInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UserInputError';
    }
}

export class HostRejection extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'HostRejection';
    }
}
