import type { KeyboardEvent } from "react";
import { useEffect, useRef } from "react";
import type { ConfirmRequest } from "../hooks";

type ConfirmDialogProps = {
  request: ConfirmRequest | null;
  onAccept: () => void;
  onDecline: () => void;
};

export default function ConfirmDialog({ request, onAccept, onDecline }: ConfirmDialogProps) {
  const acceptRef = useRef<HTMLButtonElement | null>(null);

  useEffect(() => {
    if (request) {
      acceptRef.current?.focus();
    }
  }, [request]);

  if (!request) {
    return null;
  }

  const handleKeyDown = (event: KeyboardEvent) => {
    if (event.key === "Escape") {
      event.preventDefault();
      onDecline();
    }
  };

  return (
    <div className="modal-overlay" onClick={onDecline}>
      <div
        className="modal-dialog"
        role="dialog"
        aria-modal="true"
        aria-describedby="confirm-dialog-message"
        onKeyDown={handleKeyDown}
        onClick={(event) => event.stopPropagation()}
      >
        <p id="confirm-dialog-message">{request.message}</p>
        <div className="modal-dialog__actions">
          <button type="button" className="btn btn--ghost" onClick={onDecline}>
            {request.cancelLabel}
          </button>
          <button
            ref={acceptRef}
            type="button"
            className={request.tone === "danger" ? "btn btn--danger" : "btn btn--primary"}
            onClick={onAccept}
          >
            {request.confirmLabel}
          </button>
        </div>
      </div>
    </div>
  );
}
