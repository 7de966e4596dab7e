import type { IdentityClaimResult } from 'app/identity';
import type { UserProfile } from 'storage/profile-store';

export interface IdentityFormElements {
    readonly form: HTMLFormElement;
    readonly input: HTMLInputElement;
    readonly error: HTMLElement;
}

export interface IdentityFormOptions extends IdentityFormElements {
    readonly claim: (raw: string) => Promise<IdentityClaimResult>;
    readonly onClaimed: (profile: UserProfile) => void;
    readonly onError?: (error: unknown) => void;
}

const NON_DIGITS = /\D+/g;

/**
 * Modal user-id entry: digits only, re-prompts with the store's message
 * until an unclaimed id is submitted.
 */
export const bindIdentityForm = ({ form, input, error, claim, onClaimed, onError }: IdentityFormOptions): (() => void) => {
    let pending = false;

    const clearError = () => {
        error.textContent = '';
        error.hidden = true;
    };

    const showError = (message: string) => {
        error.textContent = message;
        error.hidden = false;
    };

    const handleInput = () => {
        const digits = input.value.replace(NON_DIGITS, '');
        if (digits !== input.value) {
            input.value = digits;
        }
        clearError();
    };

    const handleSubmit = (event: Event) => {
        event.preventDefault();
        if (pending || input.value.length === 0) {
            return;
        }

        pending = true;
        claim(input.value)
            .then((result) => {
                if (result.ok) {
                    clearError();
                    onClaimed(result.profile);
                    return;
                }
                showError(result.message);
            })
            .catch((failure: unknown) => {
                showError('Could not check that ID. Please try again.');
                onError?.(failure);
            })
            .finally(() => {
                pending = false;
            });
    };

    clearError();
    input.addEventListener('input', handleInput);
    form.addEventListener('submit', handleSubmit);

    return () => {
        input.removeEventListener('input', handleInput);
        form.removeEventListener('submit', handleSubmit);
    };
};
