export { PropertyBinding } from './PropertyBinding';
export { NumberBinding } from './NumberBinding';
export { Vector3Binding } from './Vector3Binding';
export { ColorBinding } from './ColorBinding';
export { PathBinding } from './PathBinding';
export type { BindingOptions } from './PropertyBinding';
export type { PathBindingOptions, PathOrientation } from './PathBinding';
