import type { ReactNode } from 'react';

type ButtonVariant = 'primary' | 'secondary';

interface ButtonProps {
  children: ReactNode;
  href?: string;
  type?: 'button' | 'submit';
  variant?: ButtonVariant;
}

export default function Button({
  children,
  href,
  type = 'button',
  variant = 'primary',
}: ButtonProps) {
  const className = `button button--${variant}`;

  if (href) {
    return (
      <a href={href} className={className}>
        {children}
      </a>
    );
  }

  return (
    <button type={type} className={className}>
      {children}
    </button>
  );
}
