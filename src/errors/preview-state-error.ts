/** Thrown for a transition the preview state machine does not allow from its current state. */
export class PreviewStateError extends Error {
    constructor(readonly action: string, readonly state: string) {
        super(`Cannot ${action} while ${state}`);
        this.name = 'PreviewStateError';
    }
}
