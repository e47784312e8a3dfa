import React from 'react';
import { EventProperties, trackButtonClick } from '../../utils/analytics';

interface TrackedButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  /** Analytics event name for this button */
  trackingName: string;
  trackingProperties?: EventProperties;
  children: React.ReactNode;
}

/**
 * Button that reports clicks to analytics before running its own handler.
 * Disabled buttons never fire click events, so gated actions are not tracked.
 */
export const TrackedButton: React.FC<TrackedButtonProps> = ({
  trackingName,
  trackingProperties,
  onClick,
  children,
  type = 'button',
  ...buttonProps
}) => {
  const handleClick = (event: React.MouseEvent<HTMLButtonElement>) => {
    trackButtonClick(trackingName, trackingProperties);
    onClick?.(event);
  };

  return (
    <button {...buttonProps} type={type} onClick={handleClick}>
      {children}
    </button>
  );
};

export default TrackedButton;
