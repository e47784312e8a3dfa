import React, { useEffect, useRef } from 'react';
import { createPortal } from 'react-dom';
import { TrackedButton } from '../TrackedButton';

interface RestartDialogProps {
  isOpen: boolean;
  answeredCount: number;
  onConfirm: () => void;
  onCancel: () => void;
}

const RestartDialog: React.FC<RestartDialogProps> = ({ isOpen, answeredCount, onConfirm, onCancel }) => {
  const dialogRef = useRef<HTMLDialogElement>(null);

  useEffect(() => {
    const dialog = dialogRef.current;
    if (!dialog) return;

    if (isOpen) {
      if (!dialog.open) dialog.showModal();
    } else if (dialog.open) {
      dialog.close();
    }
  }, [isOpen]);

  // ESC fires "cancel"; clicks outside the dialog box land on the backdrop.
  useEffect(() => {
    const dialog = dialogRef.current;
    if (!dialog) return;

    const handleCancel = (e: Event) => {
      e.preventDefault();
      onCancel();
    };

    const handleBackdropClick = (e: MouseEvent) => {
      const rect = dialog.getBoundingClientRect();
      const outside =
        e.clientX < rect.left || e.clientX > rect.right || e.clientY < rect.top || e.clientY > rect.bottom;
      if (outside) onCancel();
    };

    dialog.addEventListener('cancel', handleCancel);
    dialog.addEventListener('click', handleBackdropClick);
    return () => {
      dialog.removeEventListener('cancel', handleCancel);
      dialog.removeEventListener('click', handleBackdropClick);
    };
  }, [onCancel]);

  const answerText = answeredCount === 1 ? '1 answer' : `${answeredCount} answers`;

  return createPortal(
    <dialog ref={dialogRef} className='modal-content' aria-labelledby='restart-dialog-title'>
      <h3 id='restart-dialog-title'>Take Assessment Again?</h3>
      <p>
        This clears {answerText} and returns you to the first category. Nothing is saved once you restart.
      </p>
      <div className='modal-actions'>
        <TrackedButton className='btn-secondary' trackingName='restart_cancel' onClick={onCancel}>
          Cancel
        </TrackedButton>
        <TrackedButton
          className='btn-danger'
          trackingName='restart_confirm'
          trackingProperties={{ answered_count: answeredCount }}
          onClick={onConfirm}
        >
          Restart Assessment
        </TrackedButton>
      </div>
    </dialog>,
    document.body
  );
};

export default RestartDialog;
