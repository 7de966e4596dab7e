import { gameConfig } from 'config/game';
import { describeAttempt } from 'app/export';
import type { RoundSnapshot } from 'app/runtime/round-machine';

export type InstructionTone = 'normal' | 'alert';

export interface HistoryLine {
    readonly text: string;
    readonly completed: boolean;
}

export interface HudView {
    readonly title: string;
    readonly level: string;
    readonly personalBest: string;
    readonly instructions: string;
    readonly tone: InstructionTone;
    readonly commandLabel: string;
    readonly commandEnabled: boolean;
    /** Newest attempt first */
    readonly history: readonly HistoryLine[];
}

const isAlert = (snapshot: RoundSnapshot): boolean =>
    snapshot.phase === 'resolved' && (snapshot.outcome === 'incorrect' || snapshot.outcome === 'gave-up');

export const createHudView = (snapshot: RoundSnapshot): HudView => ({
    title: `${gameConfig.copy.title} (User: ${snapshot.userId})`,
    level: `Level: ${snapshot.config.levelIndex}`,
    personalBest: `Personal Best: ${snapshot.personalBest}`,
    instructions: snapshot.instructions,
    tone: isAlert(snapshot) ? 'alert' : 'normal',
    commandLabel: gameConfig.copy.commandLabels[snapshot.command.label],
    commandEnabled: snapshot.command.enabled,
    history: snapshot.history
        .map((result) => ({ text: describeAttempt(result), completed: result.completed }))
        .reverse(),
});

export interface HudElements {
    readonly title: HTMLElement;
    readonly level: HTMLElement;
    readonly personalBest: HTMLElement;
    readonly instructions: HTMLElement;
    readonly command: HTMLButtonElement;
    readonly history: HTMLElement;
}

/** Writes a view into the page; history rows are rebuilt only when the count changes. */
export const createHudPresenter = (elements: HudElements): ((view: HudView) => void) => {
    let renderedHistory = -1;

    return (view) => {
        elements.title.textContent = view.title;
        elements.level.textContent = view.level;
        elements.personalBest.textContent = view.personalBest;
        elements.instructions.textContent = view.instructions;
        elements.instructions.dataset.tone = view.tone;
        elements.command.textContent = view.commandLabel;
        elements.command.disabled = !view.commandEnabled;

        if (renderedHistory === view.history.length) {
            return;
        }
        renderedHistory = view.history.length;

        const document = elements.history.ownerDocument;
        elements.history.replaceChildren(
            ...view.history.map((line) => {
                const row = document.createElement('li');
                row.textContent = line.text;
                row.dataset.result = line.completed ? 'answered' : 'gave-up';
                return row;
            }),
        );
    };
};
