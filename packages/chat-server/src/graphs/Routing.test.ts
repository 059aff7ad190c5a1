import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { EDGE_TABLE, allowedTargets, resolveRoute, type RoutableStage } from './Routing.js';
import { STAGES, type StageName } from '../types/Workflow.js';

const ROUTABLE = Object.keys(EDGE_TABLE).filter((stage): stage is RoutableStage => stage in EDGE_TABLE);

function view(from: StageName | null, nextStage: StageName | null, stepCount = 1, retrievalCount = 0) {
    return { currentStage: from, nextStage, stepCount, retrievalCount };
}

describe('resolveRoute', () => {
    it('follows a declared edge', () => {
        expect(resolveRoute('classify_input', view('classify_input', 'analyze_image'), 10)).toEqual({ target: 'analyze_image' });
        expect(resolveRoute('reason', view('reason', 'retrieve_records', 2), 10)).toEqual({ target: 'retrieve_records' });
    });

    it('lets any stage hand over to the error stage', () => {
        expect(resolveRoute('transcribe_audio', view('transcribe_audio', 'handle_error'), 10)).toEqual({ target: 'handle_error' });
    });

    it('rejects undeclared or missing next stages', () => {
        expect(resolveRoute('analyze_image', view('analyze_image', 'transcribe_audio'), 10))
            .toEqual({ target: 'handle_error', violation: 'Unclassified' });
        expect(resolveRoute('reason', view('reason', null), 10))
            .toEqual({ target: 'handle_error', violation: 'Unclassified' });
    });

    it('rejects state produced by a different stage', () => {
        expect(resolveRoute('reason', view('retrieve_records', 'safety_check'), 10))
            .toEqual({ target: 'handle_error', violation: 'Unclassified' });
    });

    it('enforces the step budget', () => {
        expect(resolveRoute('reason', view('reason', 'safety_check', 10), 10))
            .toEqual({ target: 'handle_error', violation: 'WorkflowExceeded' });
    });

    it('refuses a second retrieval', () => {
        expect(resolveRoute('reason', view('reason', 'retrieve_records', 4, 1), 10))
            .toEqual({ target: 'handle_error', violation: 'WorkflowExceeded' });
    });

    it('always yields a stage reachable from the current one', () => {
        fc.assert(
            fc.property(
                fc.constantFrom(...ROUTABLE),
                fc.option(fc.constantFrom(...STAGES), { nil: null }),
                fc.option(fc.constantFrom(...STAGES), { nil: null }),
                fc.nat(15),
                fc.nat(3),
                (from, current, next, stepCount, retrievalCount) => {
                    const decision = resolveRoute(from, view(current, next, stepCount, retrievalCount), 10);
                    expect(allowedTargets(from)).toContain(decision.target);
                    if (decision.target !== next) {
                        expect(decision.target).toBe('handle_error');
                    }
                }
            )
        );
    });
});
