export const Validation = {
  email: /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/,
  alert: {
    maxLength: 5000,
    subjectPreviewLength: 50,
  },
} as const;
