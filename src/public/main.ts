/**
 * Browser helpers shared by the server-rendered pages: flash message
 * dismissal, required-field validation and a JSON fetch wrapper.
 */

export const FLASH_DISMISS_DELAY_MS = 5000;
export const FLASH_FADE_MS = 300;

export const INVALID_BORDER_COLOR = '#dc3545';
export const VALID_BORDER_COLOR = '#ddd';

export type NotificationType = 'info' | 'success' | 'error' | 'warning';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

type FormField = HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement;

export function dismissFlashMessages(root: ParentNode = document): void {
  root.querySelectorAll<HTMLElement>('.flash').forEach((message) => {
    setTimeout(() => {
      message.style.opacity = '0';
      setTimeout(() => message.remove(), FLASH_FADE_MS);
    }, FLASH_DISMISS_DELAY_MS);
  });
}

export function showNotification(message: string, type: NotificationType = 'info', root: ParentNode = document): void {
  const container = root.querySelector('.flash-messages');
  if (!container) {
    return;
  }

  const flash = container.ownerDocument.createElement('div');
  flash.className = `flash ${type}`;
  flash.textContent = message;
  container.appendChild(flash);
  dismissFlashMessages(root);
}

/**
 * Marks empty required fields with a red border and returns false when any
 * were found.
 */
export function validateForm(form: HTMLFormElement): boolean {
  let valid = true;
  form.querySelectorAll<FormField>('[required]').forEach((field) => {
    if (!field.value.trim()) {
      field.style.borderColor = INVALID_BORDER_COLOR;
      valid = false;
    } else {
      field.style.borderColor = VALID_BORDER_COLOR;
    }
  });
  return valid;
}

export interface JsonResponse {
  json(): Promise<unknown>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<JsonResponse>;

// Fetch and JSON parse failures reject the returned promise
export async function apiRequest(
  url: string,
  method: HttpMethod = 'GET',
  data?: unknown,
  fetchImpl: FetchLike = (input, init) => fetch(input, init)
): Promise<unknown> {
  const response = await fetchImpl(url, {
    method,
    headers: {
      'Content-Type': 'application/json',
    },
    body: data === undefined || data === null ? undefined : JSON.stringify(data),
  });
  return response.json();
}

export function initialize(doc: Document = document): void {
  dismissFlashMessages(doc);

  doc.querySelectorAll('form').forEach((form) => {
    form.addEventListener('submit', (event) => {
      if (!validateForm(form)) {
        event.preventDefault();
      }
    });
  });
}

if (typeof document !== 'undefined') {
  document.addEventListener('DOMContentLoaded', () => initialize());
}
