/**
 * Flow control requested by middleware for the current hook invocation.
 * Routing and forced exit both terminate the remaining implementations.
 */
export class FlowControl {
    private routeTarget: string | undefined;
    private exitStatus: number | undefined;

    /** Module to run in-process instead of continuing */
    get route(): string | undefined {
        return this.routeTarget;
    }

    /** Forced exit code */
    get exitCode(): number | undefined {
        return this.exitStatus;
    }

    get terminate(): boolean {
        return this.routeTarget !== undefined || this.exitStatus !== undefined;
    }

    routeTo(target: string): void {
        this.routeTarget = target;
    }

    exit(code: number): void {
        this.exitStatus = code;
    }

    reset(): void {
        this.routeTarget = undefined;
        this.exitStatus = undefined;
    }
}
