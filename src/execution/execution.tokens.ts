export const PROVISIONER = Symbol('PROVISIONER');
export const STEP_EXECUTOR = Symbol('STEP_EXECUTOR');
