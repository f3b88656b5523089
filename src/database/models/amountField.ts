/**
 * Yocto amounts are stored as decimal strings; they exceed Number precision.
 */
export const yoctoAmount = {
  type: String,
  required: true,
  default: '0',
  validate: {
    validator: function(v: string) {
      return /^\d+$/.test(v);
    },
    message: 'Amount must be a non-negative integer string'
  }
};
