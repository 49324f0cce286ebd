import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { TranslateFn } from "../types/translations";

export type ConfirmTone = "primary" | "danger";

export type ConfirmOptions = {
  confirmLabel?: string;
  cancelLabel?: string;
  tone?: ConfirmTone;
};

export type ConfirmRequest = {
  message: string;
  confirmLabel: string;
  cancelLabel: string;
  tone: ConfirmTone;
};

/** What screens get: ask a yes/no question and await the answer. */
export type DialogApi = {
  confirm: (message: string, options?: ConfirmOptions) => Promise<boolean>;
};

/**
 * Holds the open confirmation, if any, for `ConfirmDialog` to render. A new
 * request declines the one still open, and so does unmounting.
 */
export function useConfirmDialog(t: TranslateFn) {
  const [request, setRequest] = useState<ConfirmRequest | null>(null);
  const answerRef = useRef<((confirmed: boolean) => void) | null>(null);

  const settle = useCallback((confirmed: boolean) => {
    const answer = answerRef.current;
    answerRef.current = null;
    setRequest(null);
    answer?.(confirmed);
  }, []);

  useEffect(() => {
    return () => {
      answerRef.current?.(false);
      answerRef.current = null;
    };
  }, []);

  const confirm = useCallback(
    (message: string, options: ConfirmOptions = {}) =>
      new Promise<boolean>((resolve) => {
        answerRef.current?.(false);
        answerRef.current = resolve;
        setRequest({
          message,
          confirmLabel: options.confirmLabel ?? t("confirm"),
          cancelLabel: options.cancelLabel ?? t("cancel"),
          tone: options.tone ?? "primary",
        });
      }),
    [t],
  );

  const accept = useCallback(() => settle(true), [settle]);
  const decline = useCallback(() => settle(false), [settle]);
  const api = useMemo<DialogApi>(() => ({ confirm }), [confirm]);

  return { api, request, accept, decline };
}
