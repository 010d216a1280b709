import {
  registerDecorator,
  ValidationOptions,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';

@ValidatorConstraint({ name: 'isBase64', async: false })
export class IsBase64Constraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    if (typeof value !== 'string') {
      return false;
    }
    // Standard alphabet with optional = padding
    const base64Regex = /^[A-Za-z0-9+/]*={0,2}$/;
    if (!base64Regex.test(value)) {
      return false;
    }
    // Round-trip rejects bad padding and stray bits
    return Buffer.from(value, 'base64').toString('base64') === value;
  }

  defaultMessage(): string {
    return 'Audio data must be valid Base64 encoded string';
  }
}

export function IsBase64(validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      target: object.constructor,
      propertyName: propertyName,
      options: validationOptions,
      constraints: [],
      validator: IsBase64Constraint,
    });
  };
}
