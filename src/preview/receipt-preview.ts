import type { Size } from "../types/geometry.types";
import type { ImageBuffer } from "../types/image-buffer";
import type { ImageProcessingResult } from "../interfaces/processing-result";
import { CropSession, type CropOutcome, type CropSessionOptions } from "../editor/crop-session";
import { PreviewStateError } from "../errors/preview-state-error";

export type PreviewView = 'original' | 'autoProcessed' | 'manuallyAdjusted';

export type PreviewState =
    | { kind: 'initial' }
    | { kind: 'previewing'; showing: PreviewView }
    | { kind: 'adjustingManually'; session: CropSession }
    | { kind: 'accepted'; image: ImageBuffer }
    | { kind: 'rejected' };

/** What the caller finally gets: an image, or an explicit rejection. */
export type PreviewOutcome =
    | { kind: 'accepted'; image: ImageBuffer }
    | { kind: 'rejected' };

type ReceiptPreviewOptions = {
    session?: CropSessionOptions;
    debug?: boolean;
};

/**
 * Review step after capture: original vs auto-processed vs manually cropped,
 * ending in exactly one accept or reject.
 */
export class ReceiptPreview {
    /** Settles once, on accept, skip or reject. */
    readonly outcome: Promise<PreviewOutcome>;

    private current: PreviewState = { kind: 'initial' };
    private useOriginalImage = false;
    private manuallyAdjusted: ImageBuffer | null = null;
    private readonly settle: (outcome: PreviewOutcome) => void;

    constructor(
        readonly originalImage: ImageBuffer,
        readonly processedImage: ImageBuffer,
        readonly processingResult: ImageProcessingResult,
        private readonly options: ReceiptPreviewOptions = {},
    ) {
        let settle: (outcome: PreviewOutcome) => void = () => {};
        this.outcome = new Promise<PreviewOutcome>((resolve) => {
            settle = resolve;
        });
        this.settle = settle;
    }

    get state(): PreviewState {
        return this.current;
    }

    get showingOriginal(): boolean {
        return this.useOriginalImage;
    }

    /** Manually adjusted image first, then the original/auto-processed selection. */
    get displayedImage(): ImageBuffer {
        if (this.manuallyAdjusted) return this.manuallyAdjusted;
        return this.useOriginalImage ? this.originalImage : this.processedImage;
    }

    /** Manual adjustment is offered for the processed image when a rectangle was detected. */
    get canAdjustManually(): boolean {
        return this.processingResult.canAdjustManually && !this.useOriginalImage;
    }

    present() {
        this.assertReviewing('present');
        this.transition({ kind: 'previewing', showing: this.view() });
    }

    /** Switching between original and processed discards a manual crop. */
    useOriginal(flag: boolean) {
        this.assertReviewing('switch image');
        this.useOriginalImage = flag;
        this.manuallyAdjusted = null;
        this.transition({ kind: 'previewing', showing: this.view() });
    }

    beginManualAdjustment(containerSize: Size): CropSession {
        this.assertReviewing('adjust manually');
        if (!this.canAdjustManually) {
            throw new PreviewStateError('adjust manually', 'no detected rectangle is available');
        }
        const session = new CropSession(
            this.originalImage,
            this.processingResult.detectedRectangle,
            containerSize,
            this.options.session,
        );
        this.transition({ kind: 'adjustingManually', session });
        return session;
    }

    /**
     * Apply the manual crop. On success the preview shows the corrected image;
     * an invalid crop keeps the user adjusting.
     */
    async applyManualAdjustment(): Promise<CropOutcome> {
        const state = this.current;
        if (state.kind !== 'adjustingManually') {
            throw new PreviewStateError('apply a manual crop', this.current.kind);
        }
        const result = await state.session.applyAsync();
        // cancelled or replaced while the warp was pending
        if (this.current !== state) return result.kind === 'applied' ? { kind: 'cancelled' } : result;

        if (result.kind === 'applied') {
            this.manuallyAdjusted = result.image;
            this.useOriginalImage = false;
            this.transition({ kind: 'previewing', showing: 'manuallyAdjusted' });
        }
        return result;
    }

    cancelManualAdjustment() {
        const state = this.current;
        if (state.kind !== 'adjustingManually') {
            throw new PreviewStateError('cancel a manual crop', this.current.kind);
        }
        state.session.cancel();
        this.transition({ kind: 'previewing', showing: this.view() });
    }

    /** Only from previewing; use `skipPreview` to accept before presenting. */
    accept(): PreviewOutcome {
        if (this.current.kind !== 'previewing') {
            throw new PreviewStateError('accept', this.current.kind);
        }
        return this.finish({ kind: 'accepted', image: this.displayedImage });
    }

    /** Accept the auto-processed image without reviewing it. */
    skipPreview(): PreviewOutcome {
        this.assertReviewing('skip preview');
        return this.finish({ kind: 'accepted', image: this.processedImage });
    }

    reject(): PreviewOutcome {
        this.assertReviewing('reject');
        return this.finish({ kind: 'rejected' });
    }

    private finish(outcome: PreviewOutcome): PreviewOutcome {
        this.transition(outcome.kind === 'accepted'
            ? { kind: 'accepted', image: outcome.image }
            : { kind: 'rejected' });
        this.settle(outcome);
        return outcome;
    }

    private view(): PreviewView {
        if (this.manuallyAdjusted) return 'manuallyAdjusted';
        return this.useOriginalImage ? 'original' : 'autoProcessed';
    }

    private assertReviewing(action: string) {
        const { kind } = this.current;
        if (kind !== 'initial' && kind !== 'previewing') {
            throw new PreviewStateError(action, kind);
        }
    }

    private transition(next: PreviewState) {
        if (this.options.debug) {
            console.log(`[ReceiptPreview] ${this.current.kind} -> ${next.kind}`);
        }
        this.current = next;
    }
}
