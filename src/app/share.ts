import { exportSubject, type ExportSink } from './export';

const CSV_MIME = 'text/csv;charset=utf-8';

type ShareCapableNavigator = Pick<Navigator, 'share' | 'canShare'>;

export interface BrowserExportSinkOptions {
    readonly document: Document;
    readonly navigator?: Partial<ShareCapableNavigator>;
}

export const toCsvDataUrl = (text: string): string => `data:${CSV_MIME},${encodeURIComponent(text)}`;

/**
 * Offers the CSV through the platform share sheet when it accepts files,
 * otherwise downloads it through a temporary link.
 */
export const createBrowserExportSink = ({ document, navigator }: BrowserExportSinkOptions): ExportSink => ({
    exportAndShare: async (userId, fileName, text) => {
        if (navigator?.share && navigator.canShare && typeof File !== 'undefined') {
            const file = new File([text], fileName, { type: CSV_MIME });
            const payload: ShareData = { files: [file], title: exportSubject(userId) };
            if (navigator.canShare(payload)) {
                await navigator.share(payload);
                return;
            }
        }

        const link = document.createElement('a');
        link.href = toCsvDataUrl(text);
        link.download = fileName;
        link.rel = 'noopener';
        document.body.appendChild(link);
        link.click();
        link.remove();
    },
});
